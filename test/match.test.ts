import test from 'node:test';
import assert from 'node:assert/strict';
import { CodeIndex } from '../src/core/codeIndex';
import { QueryError } from '../src/core/errors';
import { boundedEditDistance, filterExact, formatEntry, rankEntries } from '../src/core/match';
import type { Entry, EntryKind } from '../src/core/types';

function entry(name: string, kind: EntryKind, p: string, line = kind === 'file' ? 0 : 1): Entry {
  const dir = p.includes('/') ? p.slice(0, p.lastIndexOf('/')) : '(root)';
  return { name, kind, path: p, line, package: dir, exported: true };
}

const entries: Entry[] = [
  entry('unrelated', 'func', 'x.go'),
  entry('main.go', 'file', 'config/main.go'),
  entry('Confgi', 'func', 'typo.go'),
  entry('loadConfig', 'func', 'pkg/load.go'),
  entry('ConfigLoader', 'struct', 'pkg/loader.go'),
  entry('config.go', 'file', 'config.go'),
];

test('edit distance: transpositions count once and the bound caps the result', () => {
  assert.equal(boundedEditDistance('confgi', 'config', 2), 1);
  assert.equal(boundedEditDistance('abc', 'abc', 2), 0);
  assert.equal(boundedEditDistance('abc', 'abd', 2), 1);
  assert.equal(boundedEditDistance('', 'ab', 2), 2);
  assert.equal(boundedEditDistance('kitten', 'sitting', 2), 3);
  assert.equal(boundedEditDistance('a', 'abcdef', 2), 3);
});

test('match: scoring tiers rank exact, prefix, substring, path and fuzzy', () => {
  const ranked = rankEntries(entries, 'config');
  assert.deepEqual(
    ranked.map((r) => `${r.entry.name}=${r.score}`),
    ['config.go=100', 'ConfigLoader=80', 'loadConfig=60', 'main.go=40', 'Confgi=27.5']
  );
});

test('match: exact full name scores below exact bare name', () => {
  const ranked = rankEntries([entry('app.yaml', 'file', 'deploy/app.yaml'), entry('app', 'func', 'cmd/app.go')], 'app.yaml');
  assert.deepEqual(ranked.map((r) => `${r.entry.path}=${r.score}`), ['deploy/app.yaml=95']);
});

test('match: ties go to the shorter path, then to index order', () => {
  const ranked = rankEntries(
    [
      entry('util.go', 'file', 'pkg/deep/util.go'),
      entry('util.go', 'file', 'util.go'),
      entry('Util', 'func', 'a/b.go'),
      entry('util', 'func', 'a/c.go'),
    ],
    'util'
  );
  assert.deepEqual(ranked.map((r) => r.entry.path), ['a/b.go', 'a/c.go', 'util.go', 'pkg/deep/util.go']);
});

test('match: query is trimmed and case-insensitive; empty is rejected', () => {
  assert.equal(rankEntries(entries, '  CONFIGLOADER ')[0].entry.name, 'ConfigLoader');
  assert.throws(() => rankEntries(entries, '   '), QueryError);
});

test('match: unranked mode keeps index order and substring semantics', () => {
  assert.deepEqual(
    filterExact(entries, 'CONFIG').map((e) => e.name),
    ['main.go', 'loadConfig', 'ConfigLoader', 'config.go']
  );
});

test('match: entries format with kind, location and package', () => {
  assert.equal(formatEntry(entries[3]), '[func] loadConfig - pkg/load.go:1 (pkg)');
  assert.equal(formatEntry(entries[5]), '[file] config.go - config.go ((root))');
});

test('code index: definitions skip file entries', () => {
  const index = new CodeIndex({
    root: '/project',
    entries: [entry('Run', 'file', 'Run'), entry('Run', 'func', 'cmd/run.go', 7)],
    scannedAt: '2024-01-01T00:00:00.000Z',
    version: '0.0.0',
  });
  assert.equal(index.definitionOf('Run')?.path, 'cmd/run.go');
  assert.equal(index.definitionOf('run'), null);
  assert.deepEqual(index.match('run').map((e) => e.kind), ['file', 'func']);
});
