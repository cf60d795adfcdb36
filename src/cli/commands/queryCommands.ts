import { Command } from 'commander';
import { executeHandler } from '../types';

export const lookupCommand = new Command('lookup')
  .description('Find files and symbols by name (exact, prefix, substring or fuzzy)')
  .argument('<query>', 'Name to look up')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--max <n>', 'Maximum results', '20')
  .option('--exact', 'Unranked substring match on name or path', false)
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (query, options) => {
    await executeHandler('lookup', { query, ...options });
  });

export const searchCommand = new Command('search')
  .description('Search indexed files for lines matching a regular expression')
  .argument('<pattern>', 'Regular expression')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--max <n>', 'Maximum matches', '50')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (pattern, options) => {
    await executeHandler('search', { pattern, ...options });
  });

export const refsCommand = new Command('refs')
  .description('Find the definition and references of a symbol')
  .argument('<symbol>', 'Symbol name')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--max <n>', 'Maximum references', '50')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (symbol, options) => {
    await executeHandler('refs', { symbol, ...options });
  });

export const outlineCommand = new Command('outline')
  .description('Show the declarations of one file')
  .argument('<file>', 'File path')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (file, options) => {
    await executeHandler('outline', { file, ...options });
  });

export const symbolsCommand = new Command('symbols')
  .description('List declarations whose name contains a string, optionally of one kind')
  .argument('[query]', 'Part of the name (empty lists all)', '')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--kind <kind>', 'Only declarations of this kind (func, method, class, ...)')
  .option('--max <n>', 'Maximum results', '50')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (query, options) => {
    await executeHandler('symbols', { query, ...options });
  });

export const exportsCommand = new Command('exports')
  .description('List the exported declarations of a file or directory')
  .argument('<scope>', 'File path, or a directory (not recursive)')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (scope, options) => {
    await executeHandler('exports', { scope, ...options });
  });

export const contextCommand = new Command('context')
  .description("Show a declaration's full body with its doc comment and the file's imports")
  .argument('<file>', 'File path')
  .argument('<symbol>', 'Symbol name, or Type.method')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (file, symbol, options) => {
    await executeHandler('context', { file, symbol, ...options });
  });

export const locateCommand = new Command('locate')
  .description('Search file names, declarations and contents at once, ranked together')
  .argument('<query>', 'Text to look for')
  .option('-p, --path <path>', 'Path inside the indexed project', '.')
  .option('--max <n>', 'Maximum results', '20')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (query, options) => {
    await executeHandler('locate', { query, ...options });
  });
