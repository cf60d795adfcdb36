import { Command } from 'commander';
import { executeHandler } from '../types';

export const statusCommand = new Command('status')
  .description('Show index status and validate the store')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('status', options);
  });

export const staleCommand = new Command('stale')
  .description('List files added, deleted or modified since the last scan')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('stale', options);
  });
