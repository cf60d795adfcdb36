import path from 'path';
import { resolveIndexConfig } from '../../core/config';
import { checkIndex } from '../../core/indexCheck';
import { createLogger } from '../../core/log';
import { checkStaleness, formatStale } from '../../core/stale';
import { findIndexRoot } from '../../core/store';
import type { StaleInput, StatusInput } from '../schemas/statusSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { catchCoreErrors, isCLIError, resolveIndexContext } from './sharedHelpers';

export async function handleStatus(input: StatusInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'status' });
  const startedAt = Date.now();
  const config = resolveIndexConfig();
  const start = path.resolve(input.path);
  const root = (await findIndexRoot(start, config)) ?? start;
  const res = await checkIndex(root, config);

  const lines: string[] = [];
  lines.push(`root: ${root}`);
  lines.push(`index: ${res.ok ? 'ok' : 'not_ready'}`);
  const meta = res.found.meta;
  if (meta) {
    lines.push(`schema: ${meta.schemaVersion} (expected ${res.expected.schemaVersion})`);
    lines.push(`scannedAt: ${meta.scannedAt}`);
    lines.push(`version: ${meta.version}`);
    lines.push(`files: ${meta.fileCount}`);
    lines.push(`packages: ${meta.packageCount}`);
  } else {
    lines.push(`meta: ${res.found.metaExists ? 'unreadable' : 'missing'} (${res.found.metaPath})`);
  }
  if (!res.ok) {
    lines.push(`problems: ${res.problems.join(', ')}`);
    lines.push(`hint: ${res.hint}`);
  }

  log.info('status', { ok: res.ok, root, duration_ms: Date.now() - startedAt });
  const { ok: ready, ...details } = res;
  return success({ root, ready, ...details, textOutput: lines.join('\n') });
}

export async function handleStale(input: StaleInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'stale' });
  const startedAt = Date.now();
  const ctx = await resolveIndexContext(input.path);
  if (isCLIError(ctx)) return ctx;

  return catchCoreErrors(async () => {
    const report = await checkStaleness(ctx.index, ctx.config);
    log.info('stale', { ok: true, root: ctx.root, stale: report.isStale, duration_ms: Date.now() - startedAt });
    return success({ ...report, textOutput: formatStale(report) });
  });
}
