import { CodeIndex } from './codeIndex';
import { Logger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { wordPattern } from './refs';
import { fileSymbols } from './symbols';
import { LineCache } from './textFiles';
import { DeadCodeCandidate, DeadCodeResult } from './types';

export const TEST_FILE_PATTERN = /(_test\.go|\.test\.[jt]sx?|\.spec\.[jt]sx?|(^|\/)test_[^/]*\.py)$/i;

const ENTRY_POINT_NAMES = new Set(['main', 'init']);
const TEST_ENTRY_PREFIXES = ['Test', 'Benchmark', 'Example', 'Fuzz', 'test_'];

/** Program entry points and test-harness functions are never reported. */
export function isExcludedSymbol(name: string): boolean {
  return ENTRY_POINT_NAMES.has(name) || TEST_ENTRY_PREFIXES.some((p) => name.startsWith(p));
}

export function isTestFile(relPath: string): boolean {
  return TEST_FILE_PATTERN.test(relPath);
}

export interface DeadCodeOptions {
  kind?: string;
  pathPrefix?: string;
  /** 0 or undefined keeps every candidate. */
  max?: number;
  registry?: ExtractorRegistry;
  log?: Logger;
}

/**
 * Exported symbols with no occurrence anywhere in the index other than their
 * own definition line. The search for each symbol stops at the first hit.
 */
export async function findDeadCode(index: CodeIndex, options: DeadCodeOptions = {}): Promise<DeadCodeResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const kind = options.kind?.trim().toLowerCase() ?? '';
  const prefix = options.pathPrefix ?? '';
  const allPaths = index.filePaths();

  const symbols: DeadCodeCandidate[] = [];
  for (const relPath of allPaths) {
    if (isTestFile(relPath) || !relPath.startsWith(prefix)) continue;
    for (const sym of await fileSymbols(relPath, lines, registry, options.log)) {
      if (!sym.exported || isExcludedSymbol(sym.name)) continue;
      if (kind && sym.kind !== kind) continue;
      symbols.push({ name: sym.name, kind: sym.kind, path: relPath, line: sym.line, signature: sym.signature, parent: sym.parent });
    }
  }

  const candidates: DeadCodeCandidate[] = [];
  for (const sym of symbols) {
    if (!await hasExternalReference(sym, allPaths, lines)) candidates.push(sym);
  }

  candidates.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : a.line - b.line));
  const total = candidates.length;
  const max = options.max && options.max > 0 ? options.max : total;
  return { candidates: candidates.slice(0, max), totalCandidates: total, truncated: total > max };
}

async function hasExternalReference(sym: DeadCodeCandidate, paths: string[], lines: LineCache): Promise<boolean> {
  const word = wordPattern(sym.name);
  for (const p of paths) {
    const fileLines = await lines.get(p);
    if (!fileLines) continue;
    for (let i = 0; i < fileLines.length; i++) {
      if (p === sym.path && i + 1 === sym.line) continue;
      if (word.test(fileLines[i])) return true;
    }
  }
  return false;
}

export function formatDeadCode(r: DeadCodeResult): string {
  if (r.candidates.length === 0) return 'No dead code candidates found';
  const out = [`Dead code candidates (${r.totalCandidates} found):`];
  const byFile = new Map<string, DeadCodeCandidate[]>();
  for (const c of r.candidates) {
    const list = byFile.get(c.path) ?? [];
    list.push(c);
    byFile.set(c.path, list);
  }
  for (const [file, list] of byFile) {
    out.push('', file);
    for (const c of list) out.push(`  ${String(c.line).padStart(5)}  ${c.kind.padEnd(9)} ${c.name}`);
  }
  if (r.truncated) out.push('', `(showing ${r.candidates.length} of ${r.totalCandidates})`);
  return out.join('\n');
}
