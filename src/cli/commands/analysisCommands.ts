import { Command } from 'commander';
import { executeHandler } from '../types';

export const impactCommand = new Command('impact')
  .description('Show what depends on a symbol or file, layer by layer')
  .argument('<target>', 'Symbol name, or a file path')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--depth <n>', 'Layers to expand (0 = until nothing new)', '3')
  .option('--max <n>', 'Maximum reference sites in total', '100')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (target, options) => {
    await executeHandler('impact', { target, ...options });
  });

export const deadCodeCommand = new Command('dead-code')
  .description('List exported symbols that nothing else references')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--kind <kind>', 'Only symbols of this kind')
  .option('--path-prefix <prefix>', 'Only files under this path')
  .option('--max <n>', 'Maximum candidates (0 = all)', '50')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('dead-code', options);
  });

export const todosCommand = new Command('todos')
  .description('List TODO, FIXME, HACK and XXX comments')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--tag <tag>', 'Only this marker')
  .option('--max <n>', 'Maximum comments', '100')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('todos', options);
  });

export const entryPointsCommand = new Command('entry-points')
  .description('Find main functions, route handlers, CLI commands and init code')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--kind <kind>', 'Only this kind: main|route|cli|init')
  .option('--max <n>', 'Maximum entry points', '100')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('entry-points', options);
  });

export const testMapCommand = new Command('test-map')
  .description('Pair source files with their conventional test files')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--path-prefix <prefix>', 'Only files under this path')
  .option('--tested', 'Only files that have tests', false)
  .option('--untested', 'Only files without tests', false)
  .option('--max <n>', 'Maximum files (0 = all)', '0')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('test-map', options);
  });

export const complexityCommand = new Command('complexity')
  .description('Rank functions by cyclomatic complexity')
  .argument('[file]', 'Only this file')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--max <n>', 'Maximum functions (0 = all)', '20')
  .option('--min <n>', 'Only functions at or above this complexity', '0')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (file, options) => {
    await executeHandler('complexity', { file, ...options });
  });
