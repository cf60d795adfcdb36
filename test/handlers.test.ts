import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { ExitCodes, runHandler } from '../src/cli/types';
import type { OutputStreams } from '../src/cli/types';
import { createProject, createTempDir, removeProject } from './helpers';

interface Captured {
  io: OutputStreams;
  out: { stdout: string; stderr: string };
}

function capture(): Captured {
  const out = { stdout: '', stderr: '' };
  return {
    out,
    io: {
      stdout: { write: (chunk: string) => { out.stdout += chunk; return true; } },
      stderr: { write: (chunk: string) => { out.stderr += chunk; return true; } },
    },
  };
}

function parseObject(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  assert.ok(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed));
  return Object.fromEntries(Object.entries(parsed));
}

const files = {
  'main.go': 'package main\n\nfunc main() { Helper() }\n',
  'util.go': 'package main\n\n// Helper does nothing.\nfunc Helper() {}\n',
};

async function withScannedProject(fn: (root: string) => Promise<void>): Promise<void> {
  const root = await createProject(files);
  try {
    const c = capture();
    assert.equal(await runHandler('scan', { dir: root }, c.io), ExitCodes.OK);
    await fn(root);
  } finally {
    await removeProject(root);
  }
}

test('cli scan: text summary and JSON document', async () => {
  const root = await createProject(files);
  try {
    const text = capture();
    assert.equal(await runHandler('scan', { dir: root }, text.io), ExitCodes.OK);
    assert.equal(
      text.out.stdout,
      [
        'Indexed 2 files, 2 symbols in 1 packages',
        `root: ${root}`,
        `store: ${path.join(root, '.symtrail', 'index')}`,
        'extensions: .go=2',
        '',
      ].join('\n')
    );
    assert.equal(text.out.stderr, '');

    const json = capture();
    assert.equal(await runHandler('scan', { dir: root, json: true }, json.io), ExitCodes.OK);
    const doc = parseObject(json.out.stdout);
    assert.equal(doc.ok, true);
    assert.equal(doc.command, 'scan');
    assert.equal(doc.fileCount, 2);
    assert.equal(doc.symbolCount, 2);
    assert.equal(typeof doc.duration_ms, 'number');
    assert.equal('textOutput' in doc, false);
  } finally {
    await removeProject(root);
  }
});

test('cli lookup and refs: text output', async () => {
  await withScannedProject(async (root) => {
    const lookup = capture();
    assert.equal(await runHandler('lookup', { query: 'helper', path: root }, lookup.io), ExitCodes.OK);
    assert.equal(lookup.out.stdout, '[func] Helper - util.go:4 ((root))\n');

    const refs = capture();
    assert.equal(await runHandler('refs', { symbol: 'Helper', path: root, max: '10' }, refs.io), ExitCodes.OK);
    assert.equal(
      refs.out.stdout,
      [
        'Definition: util.go:4',
        '  func Helper() {}',
        '',
        'References (2):',
        '  main.go:3  func main() { Helper() }',
        '  util.go:3  // Helper does nothing.',
        '',
      ].join('\n')
    );
  });
});

test('cli refs and impact: JSON documents', async () => {
  await withScannedProject(async (root) => {
    const refs = capture();
    assert.equal(await runHandler('refs', { symbol: 'Helper', path: root, json: true }, refs.io), ExitCodes.OK);
    const doc = parseObject(refs.out.stdout);
    assert.equal(doc.totalReferences, 2);
    assert.deepEqual(doc.definition, { path: 'util.go', line: 4, content: 'func Helper() {}', isDefinition: true });

    const impact = capture();
    assert.equal(await runHandler('impact', { target: 'Helper', path: root, json: true }, impact.io), ExitCodes.OK);
    const res = parseObject(impact.out.stdout);
    assert.equal(res.mode, 'symbol');
    assert.deepEqual(res.summary, { totalFiles: 2, totalRefSites: 4, maxDepthReached: 2 });
  });
});

test('cli outline, related, graph, dead-code and stale', async () => {
  await withScannedProject(async (root) => {
    const outline = capture();
    assert.equal(await runHandler('outline', { file: 'util.go', path: root }, outline.io), ExitCodes.OK);
    assert.equal(outline.out.stdout, `util.go (go):\n  ${'4'.padEnd(9)} ${'func'.padEnd(9)} func Helper()\n`);

    const related = capture();
    assert.equal(await runHandler('related', { file: 'main.go', path: root }, related.io), ExitCodes.OK);
    assert.equal(related.out.stdout, 'Related files for main.go:\n\n  No related files found\n');

    const graph = capture();
    assert.equal(await runHandler('graph', { path: root, format: 'dot' }, graph.io), ExitCodes.OK);
    assert.equal(graph.out.stdout, 'digraph imports {\n  rankdir=LR;\n}\n');

    const dead = capture();
    assert.equal(await runHandler('dead-code', { path: root }, dead.io), ExitCodes.OK);
    assert.equal(dead.out.stdout, 'No dead code candidates found\n');

    const stale = capture();
    assert.equal(await runHandler('stale', { path: root, json: true }, stale.io), ExitCodes.OK);
    assert.equal(parseObject(stale.out.stdout).isStale, false);

    const status = capture();
    assert.equal(await runHandler('status', { path: root, json: true }, status.io), ExitCodes.OK);
    assert.equal(parseObject(status.out.stdout).ready, true);
  });
});

test('cli failures: missing index, bad input and unknown files', async () => {
  const empty = await createTempDir();
  try {
    const text = capture();
    assert.equal(await runHandler('refs', { symbol: 'X', path: empty }, text.io), ExitCodes.FAILED);
    assert.equal(text.out.stdout, '');
    assert.equal(
      text.out.stderr,
      `error: no index found at or above ${empty}\nhint: Run "symtrail scan <dir>" to create an index\n`
    );

    const json = capture();
    assert.equal(await runHandler('lookup', { query: 'X', path: empty, json: true }, json.io), ExitCodes.FAILED);
    assert.equal(json.out.stderr, `${JSON.stringify({ error: `no index found at or above ${empty}` })}\n`);

    const invalid = capture();
    assert.equal(await runHandler('lookup', { query: '', path: empty }, invalid.io), ExitCodes.INVALID);
    assert.equal(invalid.out.stderr, 'error: invalid arguments: query: query is required\nhint: Check command syntax with --help\n');

    const unknown = capture();
    assert.equal(await runHandler('nope', {}, unknown.io), ExitCodes.INVALID);
    assert.equal(unknown.out.stderr, 'error: unknown command: nope\nhint: Run "symtrail --help" to see available commands\n');
  } finally {
    await removeProject(empty);
  }

  await withScannedProject(async (root) => {
    const pattern = capture();
    assert.equal(await runHandler('search', { pattern: '(', path: root }, pattern.io), ExitCodes.FAILED);
    assert.ok(pattern.out.stderr.startsWith('error: invalid pattern: '));

    const missing = capture();
    assert.equal(await runHandler('outline', { file: 'nope.go', path: root }, missing.io), ExitCodes.FAILED);
    assert.equal(
      missing.out.stderr,
      'error: file nope.go not found in index\nhint: Paths are relative to the index root; run "symtrail stale" to check for new files\n'
    );
  });
});

test('cli symbols, exports, context, locate and scope', async () => {
  await withScannedProject(async (root) => {
    const symbols = capture();
    assert.equal(await runHandler('symbols', { query: 'help', path: root }, symbols.io), ExitCodes.OK);
    assert.equal(symbols.out.stdout, `Symbols matching "help":\n  ${'util.go:4'.padEnd(30)} ${'func'.padEnd(9)} func Helper()\n`);

    const exports = capture();
    assert.equal(await runHandler('exports', { scope: 'util.go', path: root }, exports.io), ExitCodes.OK);
    assert.equal(exports.out.stdout, `Exports for util.go:\n  ${'func'.padEnd(6)} ${'func Helper()'.padEnd(50)} :4\n\n1 exported symbols\n`);

    const context = capture();
    assert.equal(await runHandler('context', { file: 'util.go', symbol: 'Helper', path: root }, context.io), ExitCodes.OK);
    assert.equal(context.out.stdout, 'File: util.go\n// Helper does nothing.\nfunc Helper() {}\n');

    const missing = capture();
    assert.equal(await runHandler('context', { file: 'util.go', symbol: 'Nope', path: root }, missing.io), ExitCodes.FAILED);
    assert.equal(missing.out.stderr, 'error: symbol Nope not found in util.go\nhint: Run "symtrail outline util.go" to list its declarations\n');

    const located = capture();
    assert.equal(await runHandler('locate', { query: 'helper', path: root, json: true }, located.io), ExitCodes.OK);
    assert.equal(parseObject(located.out.stdout).total, 3);

    const scope = capture();
    assert.equal(await runHandler('scope', { path: root, json: true }, scope.io), ExitCodes.OK);
    const doc = parseObject(scope.out.stdout);
    assert.deepEqual(doc.files, ['main.go', 'util.go']);
    assert.equal(doc.loc, 7);
  });
});

test('cli todos, entry-points, test-map and complexity', async () => {
  await withScannedProject(async (root) => {
    const todos = capture();
    assert.equal(await runHandler('todos', { path: root }, todos.io), ExitCodes.OK);
    assert.equal(todos.out.stdout, 'No TODO comments found\n');

    const badTag = capture();
    assert.equal(await runHandler('todos', { path: root, tag: 'note' }, badTag.io), ExitCodes.INVALID);
    assert.ok(badTag.out.stderr.startsWith('error: invalid arguments: tag: '));

    const entries = capture();
    assert.equal(await runHandler('entry-points', { path: root }, entries.io), ExitCodes.OK);
    assert.equal(entries.out.stdout, `Main entry points:\n  ${'main.go:3'.padEnd(30)} func main() { Helper() }\n\n1 entry points found\n`);

    const both = capture();
    assert.equal(await runHandler('test-map', { path: root, tested: true, untested: true }, both.io), ExitCodes.INVALID);
    assert.equal(both.out.stderr, 'error: invalid arguments: input: --tested and --untested cannot be combined\nhint: Check command syntax with --help\n');

    const map = capture();
    assert.equal(await runHandler('test-map', { path: root, untested: true }, map.io), ExitCodes.OK);
    assert.equal(map.out.stdout, 'Test map: 0/2 source files have tests (0%)\n\n  main.go (untested)\n  util.go (untested)\n');

    const complexity = capture();
    assert.equal(await runHandler('complexity', { path: root, json: true }, complexity.io), ExitCodes.OK);
    const doc = parseObject(complexity.out.stdout);
    assert.equal(doc.totalFunctions, 2);
    assert.equal(doc.maxComplexity, 1);
  });
});
