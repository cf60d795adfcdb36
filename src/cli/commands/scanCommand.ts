import { Command } from 'commander';
import { executeHandler } from '../types';

export const scanCommand = new Command('scan')
  .description('Scan a directory and write its symbol index')
  .argument('[dir]', 'Project root to scan', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (dir, options) => {
    await executeHandler('scan', { dir, ...options });
  });
