#!/usr/bin/env node
import { Command } from 'commander';
import { scanCommand } from '../src/cli/commands/scanCommand';
import { staleCommand, statusCommand } from '../src/cli/commands/statusCommands';
import {
  contextCommand,
  exportsCommand,
  locateCommand,
  lookupCommand,
  outlineCommand,
  refsCommand,
  searchCommand,
  symbolsCommand,
} from '../src/cli/commands/queryCommands';
import { graphCommand, relatedCommand, scopeCommand } from '../src/cli/commands/graphCommands';
import {
  complexityCommand,
  deadCodeCommand,
  entryPointsCommand,
  impactCommand,
  testMapCommand,
  todosCommand,
} from '../src/cli/commands/analysisCommands';
import { readToolVersion } from '../src/core/version';

async function main(): Promise<void> {
  const program = new Command();
  program
    .name('symtrail')
    .description('symtrail: symbol index, reference and import-graph queries for source trees')
    .version(readToolVersion());

  program
    .addCommand(scanCommand)
    .addCommand(statusCommand)
    .addCommand(staleCommand)
    .addCommand(lookupCommand)
    .addCommand(searchCommand)
    .addCommand(refsCommand)
    .addCommand(outlineCommand)
    .addCommand(symbolsCommand)
    .addCommand(exportsCommand)
    .addCommand(contextCommand)
    .addCommand(locateCommand)
    .addCommand(relatedCommand)
    .addCommand(graphCommand)
    .addCommand(scopeCommand)
    .addCommand(impactCommand)
    .addCommand(deadCodeCommand)
    .addCommand(todosCommand)
    .addCommand(entryPointsCommand)
    .addCommand(testMapCommand)
    .addCommand(complexityCommand);

  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  process.stderr.write(`error: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exitCode = 1;
});
