import path from 'path';
import { Entry, ScoredEntry } from './types';
import { QueryError } from './errors';

export const MAX_FUZZY_DISTANCE = 2;

export const MATCH_SCORES = {
  exactBaseName: 100,
  exactName: 95,
  prefix: 80,
  nameSubstring: 60,
  pathSubstring: 40,
  fuzzyBest: 35,
  fuzzyWorst: 20,
} as const;

/**
 * Optimal-string-alignment distance (an adjacent transposition is one edit),
 * bounded by `max`: any distance above it comes back as `max + 1`. Rows stop
 * early once no later cell can drop back within the bound.
 */
export function boundedEditDistance(a: string, b: string, max: number): number {
  if (Math.abs(a.length - b.length) > max) return max + 1;
  if (a.length === 0 || b.length === 0) return Math.max(a.length, b.length);

  let prevPrev: number[] = [];
  let prev: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
  let prevMin = 0;

  for (let i = 1; i <= a.length; i++) {
    const cur: number[] = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let v = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        v = Math.min(v, prevPrev[j - 2] + 1);
      }
      cur[j] = v;
      if (v < rowMin) rowMin = v;
    }
    if (rowMin > max && prevMin + 1 > max) return max + 1;
    prevPrev = prev;
    prev = cur;
    prevMin = rowMin;
  }

  return Math.min(prev[b.length], max + 1);
}

function stripExtension(name: string): string {
  const ext = path.posix.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/** Highest tier the entry reaches for a lower-cased query; 0 when none does. */
export function scoreEntry(entry: Entry, q: string): number {
  const name = entry.name.toLowerCase();
  const bare = stripExtension(name);

  if (bare === q) return MATCH_SCORES.exactBaseName;
  if (name === q) return MATCH_SCORES.exactName;
  if (bare.startsWith(q)) return MATCH_SCORES.prefix;
  if (name.includes(q)) return MATCH_SCORES.nameSubstring;
  if (entry.path.toLowerCase().includes(q)) return MATCH_SCORES.pathSubstring;

  if (bare.length <= q.length + MAX_FUZZY_DISTANCE && q.length <= bare.length + MAX_FUZZY_DISTANCE) {
    const d = boundedEditDistance(q, bare, MAX_FUZZY_DISTANCE);
    if (d <= MAX_FUZZY_DISTANCE) {
      const step = (MATCH_SCORES.fuzzyBest - MATCH_SCORES.fuzzyWorst) / MAX_FUZZY_DISTANCE;
      return MATCH_SCORES.fuzzyBest - step * d;
    }
  }
  return 0;
}

function normalizeQuery(query: string): string {
  const q = query.trim().toLowerCase();
  if (!q) throw new QueryError('query must not be empty');
  return q;
}

/**
 * Entries scoring above zero, best first. Ties go to the shorter path, then
 * to the earlier entry.
 */
export function rankEntries(entries: readonly Entry[], query: string): ScoredEntry[] {
  const q = normalizeQuery(query);
  const scored: Array<ScoredEntry & { order: number }> = [];
  entries.forEach((entry, order) => {
    const score = scoreEntry(entry, q);
    if (score > 0) scored.push({ entry, score, order });
  });
  scored.sort((a, b) => b.score - a.score || a.entry.path.length - b.entry.path.length || a.order - b.order);
  return scored.map(({ entry, score }) => ({ entry, score }));
}

/** Unranked case-insensitive substring match on name or path, in index order. */
export function filterExact(entries: readonly Entry[], query: string): Entry[] {
  const q = normalizeQuery(query);
  return entries.filter((e) => e.name.toLowerCase().includes(q) || e.path.toLowerCase().includes(q));
}

export function formatEntry(e: Entry): string {
  const where = e.line > 0 ? `${e.path}:${e.line}` : e.path;
  return `[${e.kind}] ${e.name} - ${where} (${e.package})`;
}
