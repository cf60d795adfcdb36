import { formatContext, symbolContext } from '../../core/context';
import { formatExports, listExports } from '../../core/exports';
import { formatLocate, locate } from '../../core/locate';
import { createLogger } from '../../core/log';
import { formatEntry } from '../../core/match';
import { formatOutline, outlineFile } from '../../core/outline';
import { createDefaultRegistry } from '../../core/parser/registry';
import { findReferences, formatRefs } from '../../core/refs';
import { formatSearch, searchProject } from '../../core/search';
import { findSymbols, formatSymbols } from '../../core/symbols';
import type { Entry } from '../../core/types';
import type {
  ContextInput,
  ExportsInput,
  LocateInput,
  LookupInput,
  OutlineInput,
  RefsInput,
  SearchInput,
  SymbolsInput,
} from '../schemas/querySchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { catchCoreErrors, isCLIError, resolveFileArgument, resolveIndexContext, resolveScopeArgument } from './sharedHelpers';

export async function handleLookup(input: LookupInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'lookup' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const ranked: Array<{ entry: Entry; score: number | null }> = input.exact
      ? ctx.index.matchExact(input.query).map((entry) => ({ entry, score: null }))
      : ctx.index.matchScored(input.query);
    const shown = ranked.slice(0, input.max);

    log.info('lookup', {
      ok: true,
      root: ctx.root,
      exact: input.exact,
      matches: ranked.length,
      duration_ms: Date.now() - startedAt,
    });

    const lines = shown.length === 0
      ? [`No matches for "${input.query}"`]
      : shown.map(({ entry }) => formatEntry(entry));
    if (ranked.length > shown.length) lines.push(`(showing ${shown.length} of ${ranked.length})`);

    return success({
      root: ctx.root,
      query: input.query,
      exact: input.exact,
      total: ranked.length,
      results: shown.map(({ entry, score }) => (score === null ? { ...entry } : { ...entry, score })),
      textOutput: lines.join('\n'),
    });
  });
}

export async function handleSearch(input: SearchInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'search' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const matches = await searchProject(ctx.index, input.pattern, { max: input.max, log: log.child({ component: 'query' }) });
    log.info('search', { ok: true, root: ctx.root, matches: matches.length, duration_ms: Date.now() - startedAt });
    return success({
      root: ctx.root,
      pattern: input.pattern,
      matches,
      textOutput: formatSearch(input.pattern, matches),
    });
  });
}

export async function handleRefs(input: RefsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'refs' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await findReferences(ctx.index, input.symbol, { max: input.max, log: log.child({ component: 'query' }) });
    log.info('refs', {
      ok: true,
      root: ctx.root,
      definition: res.definition !== null,
      references: res.references.length,
      duration_ms: Date.now() - startedAt,
    });
    return success({
      root: ctx.root,
      ...res,
      totalReferences: res.references.length,
      textOutput: formatRefs(res),
    });
  });
}

export async function handleOutline(input: OutlineInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'outline' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const file = resolveFileArgument(ctx, input.file);
    const outline = await outlineFile(ctx.index, file, createDefaultRegistry());
    log.info('outline', { ok: true, root: ctx.root, file, symbols: outline.symbols.length, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...outline, textOutput: formatOutline(outline) });
  });
}

export async function handleSymbols(input: SymbolsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'symbols' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await findSymbols(ctx.index, input.query, {
      kind: input.kind,
      max: input.max,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'query' }),
    });
    log.info('symbols', { ok: true, root: ctx.root, kind: res.kind, matches: res.total, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatSymbols(res) });
  });
}

export async function handleExports(input: ExportsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'exports' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const scope = resolveScopeArgument(ctx, input.scope);
    const res = await listExports(ctx.index, scope, { registry: createDefaultRegistry(), log: log.child({ component: 'query' }) });
    log.info('exports', { ok: true, root: ctx.root, scope: res.scope, count: res.count, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatExports(res) });
  });
}

export async function handleContext(input: ContextInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'context' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const file = resolveFileArgument(ctx, input.file);
    const res = await symbolContext(ctx.index, file, input.symbol, createDefaultRegistry());
    log.info('context', { ok: true, root: ctx.root, file, symbol: res.symbol, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatContext(res) });
  });
}

export async function handleLocate(input: LocateInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'locate' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await locate(ctx.index, input.query, {
      max: input.max,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'query' }),
    });
    log.info('locate', { ok: true, root: ctx.root, matches: res.total, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatLocate(res) });
  });
}
