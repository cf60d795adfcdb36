import path from 'path';
import { CodeIndex } from './codeIndex';
import { Logger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { compareStrings } from './paths';
import { fileSymbols, signatureHead } from './symbols';
import { LineCache } from './textFiles';
import { ExportedSymbol, ExportsResult } from './types';

export interface ExportsOptions {
  registry?: ExtractorRegistry;
  log?: Logger;
}

/**
 * Public surface of a file, or of the files directly inside a directory
 * (`.` is the root). A scope matching neither yields an empty result.
 */
export async function listExports(index: CodeIndex, scopeArg: string, options: ExportsOptions = {}): Promise<ExportsResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const scope = scopeArg.replace(/\/+$/, '') || '.';

  const files = index.hasFile(scope)
    ? [scope]
    : index.filePaths().filter((p) => path.posix.dirname(p) === scope).sort(compareStrings);

  const symbols: ExportedSymbol[] = [];
  for (const relPath of files) {
    for (const sym of await fileSymbols(relPath, lines, registry, options.log)) {
      if (!sym.exported) continue;
      symbols.push({ name: sym.name, kind: sym.kind, path: relPath, line: sym.line, signature: sym.signature, parent: sym.parent });
    }
  }
  return { scope, symbols, count: symbols.length };
}

export function formatExports(r: ExportsResult): string {
  if (r.symbols.length === 0) return `No exported symbols found for ${r.scope}`;
  const out = [`Exports for ${r.scope}:`];
  const byFile = new Map<string, ExportedSymbol[]>();
  for (const s of r.symbols) {
    const list = byFile.get(s.path) ?? [];
    list.push(s);
    byFile.set(s.path, list);
  }
  const multiFile = byFile.size > 1;
  const indent = multiFile ? '    ' : '  ';
  for (const [file, list] of byFile) {
    if (multiFile) out.push('', `  ${file}:`);
    for (const s of list) out.push(`${indent}${s.kind.padEnd(6)} ${signatureHead(s.signature).padEnd(50)} :${s.line}`);
  }
  out.push('', `${r.count} exported symbols`);
  return out.join('\n');
}
