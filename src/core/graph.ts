import path from 'path';
import { CodeIndex } from './codeIndex';
import { NotInIndexError } from './errors';
import { Adjacency, buildForwardAdjacency, reverseAdjacency } from './imports';
import { Logger } from './log';
import { compareStrings } from './paths';
import { FocusedGraph, GraphEdge, GraphNode, ImportGraph, RelatedFiles } from './types';

export interface GraphOptions {
  log?: Logger;
}

function buildGraphResult(edges: GraphEdge[], extraNodes: Iterable<string> = []): ImportGraph {
  const fanIn = new Map<string, number>();
  const fanOut = new Map<string, number>();
  const nodeSet = new Set<string>(extraNodes);

  for (const e of edges) {
    fanOut.set(e.from, (fanOut.get(e.from) ?? 0) + 1);
    fanIn.set(e.to, (fanIn.get(e.to) ?? 0) + 1);
    nodeSet.add(e.from);
    nodeSet.add(e.to);
  }

  const nodes: GraphNode[] = [...nodeSet].map((p) => ({ path: p, fanIn: fanIn.get(p) ?? 0, fanOut: fanOut.get(p) ?? 0 }));
  nodes.sort((a, b) => b.fanIn - a.fanIn || compareStrings(a.path, b.path));
  const sortedEdges = [...edges].sort((a, b) => compareStrings(a.from, b.from) || compareStrings(a.to, b.to));

  let mostDependent: GraphNode | null = null;
  for (const n of nodes) {
    if (n.fanOut > (mostDependent?.fanOut ?? 0)) mostDependent = n;
  }
  const top = nodes[0];

  return {
    nodes,
    edges: sortedEdges,
    stats: {
      totalFiles: nodes.length,
      totalEdges: sortedEdges.length,
      mostImported: top && top.fanIn > 0 ? top : null,
      mostDependent,
    },
  };
}

function edgesOf(forward: Adjacency, keep?: ReadonlySet<string>): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const [from, targets] of forward) {
    if (keep && !keep.has(from)) continue;
    for (const to of targets) {
      if (keep && !keep.has(to)) continue;
      edges.push({ from, to });
    }
  }
  return edges;
}

/** File-level import graph over every indexed file that takes part in an import. */
export async function buildImportGraph(index: CodeIndex, options: GraphOptions = {}): Promise<ImportGraph> {
  const forward = await buildForwardAdjacency(index, options);
  return buildGraphResult(edgesOf(forward));
}

/**
 * Neighbourhood of `file`: breadth-first over imports and importers at once,
 * each file visited once. A depth of 0 or undefined is unlimited.
 */
export async function buildFocusedGraph(
  index: CodeIndex,
  file: string,
  depth: number | undefined,
  options: GraphOptions = {}
): Promise<FocusedGraph> {
  if (!index.hasFile(file)) throw new NotInIndexError(file);
  const limit = depth && depth > 0 ? depth : Infinity;

  const forward = await buildForwardAdjacency(index, options);
  const reverse = reverseAdjacency(forward);

  const visited = new Set<string>([file]);
  const queue: Array<{ path: string; dist: number }> = [{ path: file, dist: 0 }];
  while (queue.length > 0) {
    const cur = queue.shift();
    if (!cur || cur.dist >= limit) continue;
    const neighbours = [...(forward.get(cur.path) ?? []), ...(reverse.get(cur.path) ?? [])];
    for (const next of neighbours) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push({ path: next, dist: cur.dist + 1 });
    }
  }

  const result = buildGraphResult(edgesOf(forward, visited), visited);
  return { ...result, focus: file, depth: depth ?? 0 };
}

const JS_TEST_EXTENSIONS = ['.js', '.jsx', '.ts', '.tsx'];

/** Conventional test files for `relPath` that exist in the index. */
export function findTestFiles(index: CodeIndex, relPath: string): string[] {
  const ext = path.posix.extname(relPath);
  const dir = path.posix.dirname(relPath);
  const base = path.posix.basename(relPath, ext);
  const candidates: string[] = [];

  if (ext === '.go') {
    candidates.push(path.posix.join(dir, `${base}_test.go`));
  } else if (JS_TEST_EXTENSIONS.includes(ext) || ext === '.mjs' || ext === '.cjs') {
    for (const e of JS_TEST_EXTENSIONS) {
      candidates.push(path.posix.join(dir, `${base}.test${e}`), path.posix.join(dir, `${base}.spec${e}`));
    }
    for (const e of JS_TEST_EXTENSIONS) {
      candidates.push(path.posix.join(dir, '__tests__', `${base}${e}`), path.posix.join(dir, '__tests__', `${base}.test${e}`));
    }
  } else if (ext === '.py') {
    candidates.push(
      path.posix.join(dir, `test_${base}.py`),
      path.posix.join(dir, `${base}_test.py`),
      path.posix.join(dir, 'tests', `test_${base}.py`),
      path.posix.join(dir, 'tests', `${base}_test.py`)
    );
  }

  const seen = new Set<string>();
  return candidates.filter((c) => {
    if (c === relPath || seen.has(c) || !index.hasFile(c)) return false;
    seen.add(c);
    return true;
  });
}

export async function findRelatedFiles(index: CodeIndex, file: string, options: GraphOptions = {}): Promise<RelatedFiles> {
  if (!index.hasFile(file)) throw new NotInIndexError(file);
  const forward = await buildForwardAdjacency(index, options);
  const reverse = reverseAdjacency(forward);
  return {
    file,
    imports: forward.get(file) ?? [],
    importedBy: reverse.get(file) ?? [],
    tests: findTestFiles(index, file),
  };
}

export function formatGraph(g: ImportGraph): string {
  const out = [`Import graph (${g.stats.totalFiles} files, ${g.stats.totalEdges} edges):`];
  if (g.nodes.length === 0) {
    out.push('', '  No import relationships found');
    return out.join('\n');
  }

  out.push('', 'Most imported (highest fan-in):');
  for (const n of g.nodes.filter((n) => n.fanIn > 0).slice(0, 10)) {
    out.push(`  ${n.path.padEnd(50)} <- ${n.fanIn} files`);
  }

  const byFanOut = [...g.nodes].sort((a, b) => b.fanOut - a.fanOut || compareStrings(a.path, b.path));
  out.push('', 'Most dependencies (highest fan-out):');
  for (const n of byFanOut.filter((n) => n.fanOut > 0).slice(0, 10)) {
    out.push(`  ${n.path.padEnd(50)} -> ${n.fanOut} files`);
  }

  out.push('', `All edges (${g.edges.length}):`);
  for (const e of g.edges) out.push(`  ${e.from} -> ${e.to}`);
  return out.join('\n');
}

export function formatGraphDot(g: ImportGraph): string {
  const out = ['digraph imports {', '  rankdir=LR;'];
  for (const e of g.edges) out.push(`  ${JSON.stringify(e.from)} -> ${JSON.stringify(e.to)};`);
  out.push('}');
  return out.join('\n');
}

export function formatRelated(r: RelatedFiles): string {
  const out = [`Related files for ${r.file}:`];
  if (r.imports.length === 0 && r.importedBy.length === 0 && r.tests.length === 0) {
    out.push('', '  No related files found');
    return out.join('\n');
  }
  const section = (title: string, items: string[]) => {
    if (items.length === 0) return;
    out.push('', `${title} (${items.length}):`);
    for (const p of items) out.push(`  ${p}`);
  };
  section('Imports', r.imports);
  section('Imported by', r.importedBy);
  section('Test files', r.tests);
  return out.join('\n');
}
