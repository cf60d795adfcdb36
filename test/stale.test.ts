import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'path';
import { checkStaleness, formatStale } from '../src/core/stale';
import { persistIndex, scanProject } from '../src/core/store';
import { createProject, removeProject, writeFiles } from './helpers';

test('stale: a fresh index reports nothing', async () => {
  const root = await createProject({ 'keep.go': 'package a\n', 'old.go': 'package a\n' });
  try {
    const index = await scanProject(root);
    await persistIndex(index);
    const report = await checkStaleness(index);
    assert.equal(report.isStale, false);
    assert.deepEqual(report.summary, { new: 0, deleted: 0, modified: 0 });
    assert.equal(formatStale(report), `Index scanned at ${index.scannedAt}\n\nNo changes detected; index is up to date.`);
  } finally {
    await removeProject(root);
  }
});

test('stale: new, deleted and modified files are classified', async () => {
  const root = await createProject({ 'keep.go': 'package a\n', 'old.go': 'package a\n', 'same.go': 'package a\n' });
  try {
    const index = await scanProject(root);
    await writeFiles(root, { 'sub/new.go': 'package sub\n' });
    await fs.remove(path.join(root, 'old.go'));
    const later = new Date(Date.now() + 60 * 1000);
    await fs.utimes(path.join(root, 'keep.go'), later, later);

    const report = await checkStaleness(index);
    assert.equal(report.isStale, true);
    assert.deepEqual(report.newFiles, ['sub/new.go']);
    assert.deepEqual(report.deletedFiles, ['old.go']);
    assert.deepEqual(report.modifiedFiles, ['keep.go']);
    assert.equal(
      formatStale(report),
      [
        `Index scanned at ${index.scannedAt}`,
        '',
        'New files (not in index): 1',
        '  sub/new.go',
        '',
        'Deleted files (in index but missing from disk): 1',
        '  old.go',
        '',
        'Modified files (changed since last scan): 1',
        '  keep.go',
        '',
        'Summary: 1 new, 1 deleted, 1 modified. Run "symtrail scan" to update.',
      ].join('\n')
    );
  } finally {
    await removeProject(root);
  }
});

test('stale: a listed file that cannot be stat-ed counts as deleted', async () => {
  const root = await createProject({ 'keep.go': 'package a\n', 'gone.go': 'package a\n' });
  try {
    const index = await scanProject(root);
    await fs.remove(path.join(root, 'gone.go'));
    await fs.symlink(path.join(root, 'missing-target.go'), path.join(root, 'gone.go'));

    const report = await checkStaleness(index);
    assert.deepEqual(report.deletedFiles, ['gone.go']);
    assert.deepEqual(report.newFiles, []);
    assert.deepEqual(report.modifiedFiles, []);
  } finally {
    await removeProject(root);
  }
});
