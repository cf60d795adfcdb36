import { SymbolInfo } from '../types';

/**
 * `structured` builds a real syntax tree; the heuristic variants scan lines
 * and track nesting by brackets or by indentation.
 */
export type ExtractorVariant = 'structured' | 'brace-heuristic' | 'indent-heuristic';

export interface LanguageAdapter {
  readonly variant: ExtractorVariant;
  getLanguageId(): string;
  getSupportedFileExtensions(): string[];
  /**
   * Returns the declarations found in `content`. Malformed input yields a
   * partial list; a throw is treated by callers as "skip this file".
   */
  extract(filePath: string, content: string): SymbolInfo[];
}
