import path from 'path';
import { SymbolInfo } from '../types';
import { LanguageAdapter } from './adapter';
import { GoAdapter } from './go';
import { JavaScriptAdapter } from './javascript';
import { PythonAdapter } from './python';

/**
 * Immutable extension → adapter mapping. Built once and handed to every
 * component that extracts symbols.
 */
export class ExtractorRegistry {
  private readonly byExtension: ReadonlyMap<string, LanguageAdapter>;

  constructor(adapters: LanguageAdapter[]) {
    const map = new Map<string, LanguageAdapter>();
    for (const adapter of adapters) {
      for (const ext of adapter.getSupportedFileExtensions()) {
        const existing = map.get(ext);
        if (existing) {
          throw new Error(
            `extension ${ext} claimed by both ${existing.getLanguageId()} and ${adapter.getLanguageId()}`
          );
        }
        map.set(ext, adapter);
      }
    }
    this.byExtension = map;
  }

  adapterFor(filePath: string): LanguageAdapter | null {
    return this.byExtension.get(path.extname(filePath)) ?? null;
  }

  supports(filePath: string): boolean {
    return this.adapterFor(filePath) !== null;
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  /** Symbols for a supported file; an empty list for anything else. */
  extract(filePath: string, content: string): SymbolInfo[] {
    const adapter = this.adapterFor(filePath);
    return adapter ? adapter.extract(filePath, content) : [];
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([new GoAdapter(), new JavaScriptAdapter(), new PythonAdapter()]);
}
