import { CodeIndex } from './codeIndex';
import { Logger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { compareStrings } from './paths';
import { LineCache } from './textFiles';
import { SymbolInfo, SymbolMatch, SymbolsResult } from './types';

/**
 * Declarations of one indexed file. Unsupported and binary files yield
 * nothing; an extractor failure is logged as a skip.
 */
export async function fileSymbols(
  relPath: string,
  lines: LineCache,
  registry: ExtractorRegistry,
  log?: Logger
): Promise<SymbolInfo[]> {
  if (!registry.supports(relPath)) return [];
  const fileLines = await lines.get(relPath);
  if (!fileLines) return [];
  try {
    return registry.extract(relPath, fileLines.join('\n'));
  } catch (e) {
    log?.skip(relPath, 'extract_failed', { err: e });
    return [];
  }
}

export interface SymbolQueryOptions {
  kind?: string;
  /** 0 or undefined keeps every match. */
  max?: number;
  registry?: ExtractorRegistry;
  log?: Logger;
}

function nameRank(lowerName: string, q: string): number {
  if (lowerName === q) return 0;
  if (lowerName.startsWith(q)) return 1;
  return 2;
}

/**
 * Declarations whose name contains `query`, ignoring case. Exact names come
 * first, then prefixes, then other substrings; ties sort by name and location.
 * An empty query matches every declaration.
 */
export async function findSymbols(index: CodeIndex, query: string, options: SymbolQueryOptions = {}): Promise<SymbolsResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const q = query.trim().toLowerCase();
  const kind = options.kind?.trim().toLowerCase() || null;

  const found: Array<{ match: SymbolMatch; lower: string; rank: number }> = [];
  for (const relPath of index.filePaths()) {
    for (const sym of await fileSymbols(relPath, lines, registry, options.log)) {
      const lower = sym.name.toLowerCase();
      if (!lower.includes(q)) continue;
      if (kind && sym.kind !== kind) continue;
      found.push({
        match: {
          name: sym.name,
          kind: sym.kind,
          path: relPath,
          line: sym.line,
          signature: sym.signature,
          parent: sym.parent,
          exported: sym.exported,
        },
        lower,
        rank: nameRank(lower, q),
      });
    }
  }

  found.sort(
    (a, b) =>
      a.rank - b.rank ||
      compareStrings(a.lower, b.lower) ||
      compareStrings(a.match.path, b.match.path) ||
      a.match.line - b.match.line
  );
  const matches = found.map((f) => f.match);
  const max = options.max && options.max > 0 ? options.max : matches.length;
  return { query, kind, matches: matches.slice(0, max), total: matches.length };
}

/** Last line of a signature; decorators sit on the lines before it. */
export function signatureHead(signature: string): string {
  return signature.split('\n').pop() ?? signature;
}

export function formatSymbols(r: SymbolsResult): string {
  const filter = r.kind ? ` (kind ${r.kind})` : '';
  if (r.matches.length === 0) return `No symbols matching "${r.query}"${filter}`;
  const out = [`Symbols matching "${r.query}"${filter}:`];
  for (const m of r.matches) {
    out.push(`  ${`${m.path}:${m.line}`.padEnd(30)} ${m.kind.padEnd(9)} ${signatureHead(m.signature)}`);
  }
  if (r.total > r.matches.length) out.push(`(showing ${r.matches.length} of ${r.total})`);
  return out.join('\n');
}
