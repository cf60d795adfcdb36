import { analyzeComplexity, formatComplexity } from '../../core/complexity';
import { defaultQueryDefaults } from '../../core/config';
import { findDeadCode, formatDeadCode } from '../../core/deadCode';
import { findEntryPoints, formatEntryPoints } from '../../core/entryPoints';
import { analyzeImpact, classifyImpactTarget, formatImpact } from '../../core/impact';
import { createLogger } from '../../core/log';
import { createDefaultRegistry } from '../../core/parser/registry';
import { formatTestMap, mapTests } from '../../core/testMap';
import { findTodos, formatTodos } from '../../core/todos';
import type {
  ComplexityInput,
  DeadCodeInput,
  EntryPointsInput,
  ImpactInput,
  TestMapInput,
  TodosInput,
} from '../schemas/analysisSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { catchCoreErrors, isCLIError, resolveFileArgument, resolveIndexContext } from './sharedHelpers';

export async function handleImpact(input: ImpactInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'impact' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const target = classifyImpactTarget(input.target) === 'file' ? resolveFileArgument(ctx, input.target) : input.target;
    const res = await analyzeImpact(ctx.index, target, {
      maxDepth: input.depth,
      maxResults: input.max,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'analysis' }),
    });
    log.info('impact', {
      ok: true,
      root: ctx.root,
      mode: res.mode,
      sites: res.summary.totalRefSites,
      duration_ms: Date.now() - startedAt,
    });
    return success({ root: ctx.root, ...res, textOutput: formatImpact(res) });
  });
}

export async function handleDeadCode(input: DeadCodeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'dead-code' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await findDeadCode(ctx.index, {
      kind: input.kind,
      pathPrefix: input.pathPrefix,
      max: input.max,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'analysis' }),
    });
    log.info('dead_code', {
      ok: true,
      root: ctx.root,
      candidates: res.totalCandidates,
      duration_ms: Date.now() - startedAt,
    });
    return success({ root: ctx.root, ...res, textOutput: formatDeadCode(res) });
  });
}

export async function handleTodos(input: TodosInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'todos' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await findTodos(ctx.index, { tag: input.tag, max: input.max, log: log.child({ component: 'analysis' }) });
    log.info('todos', { ok: true, root: ctx.root, comments: res.total, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatTodos(res) });
  });
}

export async function handleEntryPoints(input: EntryPointsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'entry-points' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await findEntryPoints(ctx.index, { kind: input.kind, max: input.max, log: log.child({ component: 'analysis' }) });
    log.info('entry_points', { ok: true, root: ctx.root, entryPoints: res.total, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatEntryPoints(res) });
  });
}

export async function handleTestMap(input: TestMapInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'test-map' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = mapTests(ctx.index, {
      pathPrefix: input.pathPrefix,
      filter: input.tested ? 'tested' : input.untested ? 'untested' : 'all',
      max: input.max,
    });
    log.info('test_map', {
      ok: true,
      root: ctx.root,
      sourceFiles: res.summary.sourceFiles,
      testedFiles: res.summary.testedFiles,
      duration_ms: Date.now() - startedAt,
    });
    return success({ root: ctx.root, ...res, textOutput: formatTestMap(res) });
  });
}

export async function handleComplexity(input: ComplexityInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'complexity' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const res = await analyzeComplexity(ctx.index, {
      file: input.file === undefined ? undefined : resolveFileArgument(ctx, input.file),
      max: input.max,
      minComplexity: input.min,
      highThreshold: defaultQueryDefaults().highComplexity,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'analysis' }),
    });
    log.info('complexity', { ok: true, root: ctx.root, functions: res.totalFunctions, duration_ms: Date.now() - startedAt });
    return success({ root: ctx.root, ...res, textOutput: formatComplexity(res) });
  });
}
