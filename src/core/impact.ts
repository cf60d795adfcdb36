import { CodeIndex } from './codeIndex';
import { NotInIndexError, QueryError } from './errors';
import { buildForwardAdjacency, reverseAdjacency } from './imports';
import { Logger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { findReferences } from './refs';
import { LineCache } from './textFiles';
import { ImpactLayer, ImpactMode, ImpactResult, ImpactSite, RefsResult, SymbolInfo } from './types';

export interface ImpactOptions {
  /** Layers to expand; 0 or undefined means until nothing new appears. */
  maxDepth?: number;
  maxResults: number;
  registry?: ExtractorRegistry;
  log?: Logger;
}

/** Targets naming a path (a slash or a dot) are files; anything else is a symbol. */
export function classifyImpactTarget(target: string): ImpactMode {
  return target.includes('/') || target.includes('.') ? 'file' : 'symbol';
}

export async function analyzeImpact(index: CodeIndex, target: string, options: ImpactOptions): Promise<ImpactResult> {
  const t = target.trim();
  if (!t) throw new QueryError('impact target must not be empty');
  return classifyImpactTarget(t) === 'file' ? impactOfFile(index, t, options) : impactOfSymbol(index, t, options);
}

/**
 * Resolves the innermost extracted symbol containing a line. Each file is
 * read and parsed at most once.
 */
class EnclosingSymbolFinder {
  private readonly parsed = new Map<string, SymbolInfo[]>();

  constructor(
    private readonly registry: ExtractorRegistry,
    private readonly lines: LineCache,
    private readonly log?: Logger
  ) {}

  async find(relPath: string, line: number): Promise<SymbolInfo | null> {
    let best: SymbolInfo | null = null;
    for (const s of await this.symbolsOf(relPath)) {
      if (s.line <= line && line <= s.endLine && (!best || s.line > best.line)) best = s;
    }
    return best;
  }

  private async symbolsOf(relPath: string): Promise<SymbolInfo[]> {
    const cached = this.parsed.get(relPath);
    if (cached) return cached;
    let symbols: SymbolInfo[] = [];
    if (this.registry.supports(relPath)) {
      const fileLines = await this.lines.get(relPath);
      if (fileLines) {
        try {
          symbols = this.registry.extract(relPath, fileLines.join('\n'));
        } catch (e) {
          this.log?.skip(relPath, 'extract_failed', { err: e });
        }
      }
    }
    this.parsed.set(relPath, symbols);
    return symbols;
  }
}

function depthLimit(maxDepth: number | undefined): number {
  return maxDepth && maxDepth > 0 ? maxDepth : Infinity;
}

function layerLabel(depth: number, noun: string, first: string): string {
  if (depth === 1) return first;
  if (depth === 2) return `transitive ${noun}`;
  return `depth-${depth} ${noun}`;
}

function summarize(layers: ImpactLayer[]): ImpactResult['summary'] {
  const files = new Set<string>();
  let totalRefSites = 0;
  let maxDepthReached = 0;
  for (const layer of layers) {
    maxDepthReached = Math.max(maxDepthReached, layer.depth);
    for (const site of layer.sites) {
      files.add(site.path);
      totalRefSites++;
    }
  }
  return { totalFiles: files.size, totalRefSites, maxDepthReached };
}

async function impactOfSymbol(index: CodeIndex, symbol: string, options: ImpactOptions): Promise<ImpactResult> {
  const limit = depthLimit(options.maxDepth);
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const finder = new EnclosingSymbolFinder(options.registry ?? createDefaultRegistry(), lines, options.log);

  const visited = new Set<string>([symbol]);
  const layers: ImpactLayer[] = [];
  let total = 0;

  const collect = async (refs: RefsResult): Promise<ImpactSite[]> => {
    const sites: ImpactSite[] = [];
    for (const ref of refs.references) {
      if (total >= options.maxResults) break;
      const enclosing = await finder.find(ref.path, ref.line);
      sites.push({
        path: ref.path,
        line: ref.line,
        content: ref.content,
        enclosing: enclosing ? { name: enclosing.name, kind: enclosing.kind, line: enclosing.line } : undefined,
      });
      total++;
    }
    return sites;
  };
  const refsOf = (name: string) =>
    findReferences(index, name, { max: options.maxResults - total, lines, log: options.log });

  const direct = await refsOf(symbol);
  layers.push({ depth: 1, label: layerLabel(1, 'dependents', 'direct references'), sites: await collect(direct) });

  let previous = layers[0].sites;
  for (let depth = 2; depth <= limit && total < options.maxResults; depth++) {
    const next: string[] = [];
    for (const site of previous) {
      const name = site.enclosing?.name;
      if (!name || visited.has(name)) continue;
      visited.add(name);
      next.push(name);
    }
    if (next.length === 0) break;

    const sites: ImpactSite[] = [];
    for (const name of next) {
      if (total >= options.maxResults) break;
      sites.push(...await collect(await refsOf(name)));
    }
    if (sites.length === 0) break;
    layers.push({ depth, label: layerLabel(depth, 'dependents', 'direct references'), sites });
    previous = sites;
  }

  const location = direct.definition ? { path: direct.definition.path, line: direct.definition.line } : null;
  return {
    target: symbol,
    mode: 'symbol',
    targetKind: index.definitionOf(symbol)?.kind ?? null,
    location,
    layers,
    summary: summarize(layers),
  };
}

async function impactOfFile(index: CodeIndex, file: string, options: ImpactOptions): Promise<ImpactResult> {
  if (!index.hasFile(file)) throw new NotInIndexError(file);
  const limit = depthLimit(options.maxDepth);
  const reverse = reverseAdjacency(await buildForwardAdjacency(index, { log: options.log }));

  const visited = new Set<string>([file]);
  const layers: ImpactLayer[] = [];
  let total = 0;
  let frontier = [file];

  for (let depth = 1; depth <= limit && total < options.maxResults; depth++) {
    const sites: ImpactSite[] = [];
    const nextFrontier: string[] = [];
    for (const f of frontier) {
      for (const importer of reverse.get(f) ?? []) {
        if (total >= options.maxResults) break;
        if (visited.has(importer)) continue;
        visited.add(importer);
        sites.push({ path: importer, line: 0, content: '' });
        nextFrontier.push(importer);
        total++;
      }
    }
    if (sites.length === 0 && depth > 1) break;
    layers.push({ depth, label: layerLabel(depth, 'importers', 'direct importers'), sites });
    if (sites.length === 0) break;
    frontier = nextFrontier;
  }

  return {
    target: file,
    mode: 'file',
    targetKind: 'file',
    location: { path: file, line: 0 },
    layers,
    summary: summarize(layers),
  };
}

export function formatImpact(r: ImpactResult): string {
  let header: string;
  if (r.mode === 'file') header = `Impact analysis for file "${r.target}"`;
  else if (r.location) header = `Impact analysis for symbol "${r.target}" (${r.location.path}:${r.location.line})`;
  else header = `Impact analysis for "${r.target}"`;
  const out = [header];

  if (r.summary.totalRefSites === 0) {
    out.push('', '  No dependents found');
    return out.join('\n');
  }

  for (const layer of r.layers) {
    if (layer.sites.length === 0) continue;
    out.push('', `Depth ${layer.depth}: ${layer.label} (${layer.sites.length}):`);
    for (const site of layer.sites) {
      if (!site.content) {
        out.push(`  ${site.path}`);
        continue;
      }
      const via = site.enclosing ? ` [in ${site.enclosing.name}]` : '';
      out.push(`  ${site.path}:${site.line}${via}  ${site.content}`);
    }
  }
  out.push('', `Total blast radius: ${r.summary.totalFiles} files, ${r.summary.totalRefSites} reference sites`);
  return out.join('\n');
}
