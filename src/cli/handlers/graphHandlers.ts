import { buildFocusedGraph, buildImportGraph, findRelatedFiles, formatGraph, formatGraphDot, formatRelated } from '../../core/graph';
import { createLogger } from '../../core/log';
import { createDefaultRegistry } from '../../core/parser/registry';
import { formatScope, summarizeScope } from '../../core/scope';
import type { ImportGraph } from '../../core/types';
import type { GraphInput, RelatedInput, ScopeInput } from '../schemas/graphSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { catchCoreErrors, isCLIError, resolveFileArgument, resolveIndexContext, resolveScopeArgument } from './sharedHelpers';

export async function handleRelated(input: RelatedInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'related' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const file = resolveFileArgument(ctx, input.file);
    const related = await findRelatedFiles(ctx.index, file, { log: log.child({ component: 'graph' }) });
    log.info('related', { ok: true, root: ctx.root, file, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...related, textOutput: formatRelated(related) });
  });
}

export async function handleGraph(input: GraphInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    let graph: ImportGraph;
    let focus: string | null = null;
    if (input.focus) {
      focus = resolveFileArgument(ctx, input.focus);
      graph = await buildFocusedGraph(ctx.index, focus, input.depth, { log: log.child({ component: 'graph' }) });
    } else {
      graph = await buildImportGraph(ctx.index, { log: log.child({ component: 'graph' }) });
    }

    log.info('graph', {
      ok: true,
      root: ctx.root,
      focus,
      files: graph.stats.totalFiles,
      edges: graph.stats.totalEdges,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      root: ctx.root,
      focus,
      depth: input.depth,
      nodes: graph.nodes,
      edges: graph.edges,
      stats: graph.stats,
      textOutput: input.format === 'dot' ? formatGraphDot(graph) : formatGraph(graph),
    });
  });
}

export async function handleScope(input: ScopeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'scope' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const dir = resolveScopeArgument(ctx, input.dir);
    const res = await summarizeScope(ctx.index, dir, {
      recursive: input.recursive,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'graph' }),
    });
    log.info('scope', { ok: true, root: ctx.root, directory: res.directory, files: res.fileCount, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatScope(res) });
  });
}
