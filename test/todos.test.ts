import test from 'node:test';
import assert from 'node:assert/strict';
import { QueryError } from '../src/core/errors';
import { scanProject } from '../src/core/store';
import { findTodos, formatTodos, parseTodoTag } from '../src/core/todos';
import { createProject, removeProject } from './helpers';

const files = {
  'a.go': 'package a\n\n// TODO: split this file\nfunc A() {} // FIXME handle errors\n// todo lowercase counts too\n',
  'b.py': '# HACK: temporary workaround\nx = 1  # XXX\n',
  'notes.txt': 'TODOS are not markers\nDone.\n',
};

test('todos: every marker in path order, case-insensitive', async () => {
  const root = await createProject(files);
  try {
    const res = await findTodos(await scanProject(root), { max: 100 });
    assert.deepEqual(res.comments.map((c) => `${c.path}:${c.line}:${c.tag}:${c.message}`), [
      'a.go:3:TODO:split this file',
      'a.go:4:FIXME:handle errors',
      'a.go:5:TODO:lowercase counts too',
      'b.py:1:HACK:temporary workaround',
      'b.py:2:XXX:',
    ]);
    assert.equal(res.comments[1].content, 'func A() {} // FIXME handle errors');
    assert.equal(res.total, 5);
    assert.deepEqual(res.byTag, { TODO: 2, FIXME: 1, HACK: 1, XXX: 1 });
  } finally {
    await removeProject(root);
  }
});

test('todos: tag filter, truncation and text output', async () => {
  const root = await createProject(files);
  try {
    const index = await scanProject(root);
    const res = await findTodos(index, { tag: 'todo', max: 1 });
    assert.equal(res.total, 2);
    assert.deepEqual(res.byTag, { TODO: 2, FIXME: 1, HACK: 1, XXX: 1 });
    assert.equal(
      formatTodos(res),
      [
        '2 comments:',
        `  ${'a.go:3'.padEnd(30)} [TODO] split this file`,
        '(showing 1 of 2)',
        '',
        'By tag: TODO=2, FIXME=1, HACK=1, XXX=1',
      ].join('\n')
    );
  } finally {
    await removeProject(root);
  }
});

test('todos: nothing found and unknown tags', async () => {
  const root = await createProject({ 'clean.go': 'package clean\n' });
  try {
    const res = await findTodos(await scanProject(root), { max: 10 });
    assert.deepEqual(res, { comments: [], total: 0, byTag: {} });
    assert.equal(formatTodos(res), 'No TODO comments found');
  } finally {
    await removeProject(root);
  }
  assert.equal(parseTodoTag(' fixme '), 'FIXME');
  assert.throws(() => parseTodoTag('note'), (e: unknown) => {
    assert.ok(e instanceof QueryError);
    assert.equal(e.message, 'unknown tag note; expected one of TODO, FIXME, HACK, XXX');
    return true;
  });
});
