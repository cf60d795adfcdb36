import { Command } from 'commander';
import { executeHandler } from '../types';

export const relatedCommand = new Command('related')
  .description('Show what a file imports, what imports it, and its tests')
  .argument('<file>', 'File path')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (file, options) => {
    await executeHandler('related', { file, ...options });
  });

export const graphCommand = new Command('graph')
  .description('Show the file-level import graph')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--focus <file>', 'Only the neighbourhood of this file')
  .option('--depth <n>', 'Hops from the focus file (0 = unlimited)', '0')
  .option('--format <format>', 'Output format: list|dot', 'list')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('graph', options);
  });

export const scopeCommand = new Command('scope')
  .description('Summarise a directory: files, lines, declarations and import neighbours')
  .argument('[dir]', 'Directory', '.')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--recursive', 'Include subdirectories', false)
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (dir, options) => {
    await executeHandler('scope', { dir, ...options });
  });
