import path from 'path';
import { CodeIndex } from './codeIndex';
import { NotInIndexError, QueryError, SymbolNotFoundError } from './errors';
import { extractImportSpecifiers } from './imports';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { readTextFile, splitLines } from './textFiles';
import { SymbolContext, SymbolInfo } from './types';

const JS_EXTENSIONS = new Set(['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs']);

function isCommentLine(trimmed: string, ext: string): boolean {
  if (trimmed === '') return false;
  if (ext === '.go') return trimmed.startsWith('//');
  if (ext === '.py') return trimmed.startsWith('#');
  if (JS_EXTENSIONS.has(ext)) return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
  return false;
}

/** Contiguous comment lines above `startIdx`, skipping any decorators in between. */
function docCommentAbove(lines: string[], startIdx: number, ext: string): string {
  let i = startIdx - 1;
  if (ext !== '.go') {
    while (i >= 0 && lines[i].trim().startsWith('@')) i--;
  }
  const collected: string[] = [];
  for (; i >= 0 && isCommentLine(lines[i].trim(), ext); i--) collected.unshift(lines[i]);
  return collected.join('\n');
}

/** `Type.method` selects a member; a plain name prefers a top-level declaration. */
function pickSymbol(symbols: SymbolInfo[], symbol: string): SymbolInfo | null {
  const dot = symbol.lastIndexOf('.');
  if (dot > 0) {
    const parent = symbol.slice(0, dot);
    const name = symbol.slice(dot + 1);
    return symbols.find((s) => s.parent === parent && s.name === name) ?? null;
  }
  let match: SymbolInfo | null = null;
  for (const s of symbols) {
    if (s.name !== symbol) continue;
    if (!match || (match.parent !== '' && s.parent === '')) match = s;
  }
  return match;
}

/** The full declaration of `symbol` in `file`, with the file's imports and the doc comment above it. */
export async function symbolContext(
  index: CodeIndex,
  file: string,
  symbol: string,
  registry: ExtractorRegistry = createDefaultRegistry()
): Promise<SymbolContext> {
  if (!index.hasFile(file)) throw new NotInIndexError(file);
  const ext = path.posix.extname(file);
  const adapter = registry.adapterFor(file);
  if (!adapter) throw new QueryError(`no symbol extractor for ${ext || 'extensionless'} files`);

  const content = await readTextFile(index.absolutePath(file));
  const lines = content === null ? [] : splitLines(content);
  const match = pickSymbol(adapter.extract(file, lines.join('\n')), symbol);
  if (!match) throw new SymbolNotFoundError(file, symbol);

  const start = match.line - 1;
  const end = Math.min(Math.max(match.endLine, match.line), lines.length);
  return {
    file,
    symbol: match.name,
    kind: match.kind,
    line: match.line,
    endLine: match.endLine,
    signature: match.signature,
    parent: match.parent,
    imports: extractImportSpecifiers(file, lines),
    docComment: docCommentAbove(lines, start, ext),
    body: lines.slice(start, end).join('\n'),
  };
}

export function formatContext(c: SymbolContext): string {
  const out = [`File: ${c.file}`];
  if (c.imports.length > 0) {
    out.push('Imports:');
    for (const imp of c.imports) out.push(`  ${imp}`);
    out.push('');
  }
  if (c.docComment) out.push(c.docComment);
  out.push(c.body);
  return out.join('\n');
}
