import path from 'path';
import { CodeIndex } from './codeIndex';
import { QueryError } from './errors';
import { Logger } from './log';
import { ExtractorRegistry } from './parser/registry';
import { compareStrings } from './paths';
import { escapeRegExp } from './refs';
import { searchLines } from './search';
import { findSymbols } from './symbols';
import { LocateMatch, LocateResult } from './types';

export const LOCATE_SCORES = {
  fileExact: 100,
  symbolExact: 90,
  fileNameContains: 80,
  symbolPrefix: 75,
  symbolContains: 65,
  filePath: 60,
  content: 50,
} as const;

export interface LocateOptions {
  max: number;
  registry?: ExtractorRegistry;
  log?: Logger;
}

function stripExtension(name: string): string {
  const ext = path.posix.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/**
 * One ranked list over file names, declarations and line contents. The
 * content pass is a case-insensitive literal match. A location found by
 * several passes keeps its best-scored match only.
 */
export async function locate(index: CodeIndex, query: string, options: LocateOptions): Promise<LocateResult> {
  const q = query.trim();
  if (!q) throw new QueryError('query must not be empty');
  const lower = q.toLowerCase();
  const matches: LocateMatch[] = [];

  for (const e of index.match(q)) {
    if (e.kind !== 'file') continue;
    const name = e.name.toLowerCase();
    let score: number = LOCATE_SCORES.filePath;
    if (name === lower || stripExtension(name) === lower) score = LOCATE_SCORES.fileExact;
    else if (name.includes(lower)) score = LOCATE_SCORES.fileNameContains;
    matches.push({ type: 'file', path: e.path, line: 0, name: e.name, kind: 'file', content: '', score });
  }

  const symbols = await findSymbols(index, q, { max: Math.max(options.max * 5, 100), registry: options.registry, log: options.log });
  for (const s of symbols.matches) {
    const name = s.name.toLowerCase();
    let score: number = LOCATE_SCORES.symbolContains;
    if (name === lower) score = LOCATE_SCORES.symbolExact;
    else if (name.startsWith(lower)) score = LOCATE_SCORES.symbolPrefix;
    matches.push({ type: 'symbol', path: s.path, line: s.line, name: s.name, kind: s.kind, content: '', score });
  }

  const content = await searchLines(index, new RegExp(escapeRegExp(q), 'i'), { max: Math.max(options.max * 10, 200), log: options.log });
  for (const m of content) {
    matches.push({
      type: 'content',
      path: m.path,
      line: m.line,
      name: path.posix.basename(m.path),
      kind: null,
      content: m.content,
      score: LOCATE_SCORES.content,
    });
  }

  matches.sort((a, b) => b.score - a.score || compareStrings(a.path, b.path) || a.line - b.line);
  const seen = new Set<string>();
  const unique = matches.filter((m) => {
    const key = m.type === 'file' ? m.path : `${m.path}:${m.line}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return { query: q, matches: unique.slice(0, options.max), total: unique.length };
}

export function formatLocate(r: LocateResult): string {
  if (r.matches.length === 0) return `No matches for "${r.query}"`;
  const out = [`Matches for "${r.query}":`];
  for (const m of r.matches) {
    const where = m.line > 0 ? `${m.path}:${m.line}` : m.path;
    const detail = m.type === 'content' ? m.content : m.type === 'symbol' ? `${m.kind} ${m.name}` : '';
    out.push(`  ${m.type.padEnd(8)} ${where.padEnd(30)} ${detail}`.trimEnd());
  }
  if (r.total > r.matches.length) out.push(`(showing ${r.matches.length} of ${r.total})`);
  return out.join('\n');
}
