import { resolveIndexConfig } from '../../core/config';
import { createLogger } from '../../core/log';
import { createDefaultRegistry } from '../../core/parser/registry';
import { persistIndex, scanProject } from '../../core/store';
import type { ScanInput } from '../schemas/indexSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { catchCoreErrors } from './sharedHelpers';

const PROGRESS_EVERY = 200;

export async function handleScan(input: ScanInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'scan' });
  const startedAt = Date.now();
  const config = resolveIndexConfig();

  return catchCoreErrors(async () => {
    const index = await scanProject(input.dir, {
      config,
      registry: createDefaultRegistry(),
      log: log.child({ component: 'scan' }),
      onProgress: (p) => {
        if (p.processedFiles % PROGRESS_EVERY === 0 || p.processedFiles === p.totalFiles) {
          log.debug('scan_progress', { processed: p.processedFiles, total: p.totalFiles, file: p.currentFile });
        }
      },
    });
    const storeDir = await log.span('persist', { root: index.root }, () => persistIndex(index, config));
    const meta = index.meta();
    const symbolCount = index.entries.length - index.fileCount;

    log.info('scan', {
      ok: true,
      root: index.root,
      files: meta.fileCount,
      symbols: symbolCount,
      duration_ms: Date.now() - startedAt,
    });

    const lines = [
      `Indexed ${meta.fileCount} files, ${symbolCount} symbols in ${meta.packageCount} packages`,
      `root: ${index.root}`,
      `store: ${storeDir}`,
    ];
    const exts = Object.entries(meta.extensions).sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1));
    if (exts.length > 0) lines.push(`extensions: ${exts.map(([ext, n]) => `${ext}=${n}`).join(', ')}`);

    return success({
      root: index.root,
      storeDir,
      fileCount: meta.fileCount,
      packageCount: meta.packageCount,
      symbolCount,
      extensions: meta.extensions,
      scannedAt: meta.scannedAt,
      textOutput: lines.join('\n'),
    });
  });
}
