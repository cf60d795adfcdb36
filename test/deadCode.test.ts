import test from 'node:test';
import assert from 'node:assert/strict';
import type { CodeIndex } from '../src/core/codeIndex';
import { findDeadCode, formatDeadCode, isExcludedSymbol, isTestFile } from '../src/core/deadCode';
import { scanProject } from '../src/core/store';
import { createProject, removeProject, writeFiles } from './helpers';

const files = {
  'a.go': 'package app\n\nfunc Helper() {}\n\nfunc unexported() {}\n',
  'b.go': 'package app\n\nfunc Use() { Helper() }\n',
  'main.go': 'package app\n\nfunc main() {}\n',
  'a_test.go': 'package app\n\nfunc Fixture() {}\n',
  'lib/dead.py': 'def Orphan():\n    pass\n\ndef _hidden():\n    pass\n',
  'web/x.ts': 'export function TestLike() {}\nexport const used = 1;\nconsole.log(used);\n',
};

async function withIndex(fn: (index: CodeIndex) => Promise<void>): Promise<void> {
  const root = await createProject(files);
  try {
    await fn(await scanProject(root));
  } finally {
    await removeProject(root);
  }
}

test('dead code: naming conventions for entry points and test files', () => {
  assert.equal(isExcludedSymbol('main'), true);
  assert.equal(isExcludedSymbol('init'), true);
  assert.equal(isExcludedSymbol('BenchmarkParse'), true);
  assert.equal(isExcludedSymbol('test_login'), true);
  assert.equal(isExcludedSymbol('Maintain'), false);
  assert.equal(isTestFile('pkg/a_test.go'), true);
  assert.equal(isTestFile('web/app.spec.tsx'), true);
  assert.equal(isTestFile('tests/test_views.py'), true);
  assert.equal(isTestFile('src/contest.py'), false);
});

test('dead code: exported symbols with no outside reference, sorted by path', async () => {
  await withIndex(async (index) => {
    const res = await findDeadCode(index);
    assert.deepEqual(res.candidates.map((c) => `${c.path}:${c.line}:${c.kind}:${c.name}`), [
      'b.go:3:func:Use',
      'lib/dead.py:1:func:Orphan',
    ]);
    assert.equal(res.truncated, false);
    assert.equal(
      formatDeadCode(res),
      'Dead code candidates (2 found):\n\nb.go\n      3  func      Use\n\nlib/dead.py\n      1  func      Orphan'
    );
  });
});

test('dead code: kind, path prefix and max filters', async () => {
  await withIndex(async (index) => {
    assert.deepEqual((await findDeadCode(index, { pathPrefix: 'lib/' })).candidates.map((c) => c.name), ['Orphan']);
    assert.deepEqual((await findDeadCode(index, { kind: 'const' })).candidates, []);

    const capped = await findDeadCode(index, { max: 1 });
    assert.deepEqual(capped.candidates.map((c) => c.name), ['Use']);
    assert.equal(capped.totalCandidates, 2);
    assert.equal(capped.truncated, true);
    assert.equal(formatDeadCode(await findDeadCode(index, { kind: 'class' })), 'No dead code candidates found');
  });
});

test('dead code: adding a caller clears a candidate and removing it brings it back', async () => {
  const root = await createProject({
    'lib/dead.py': 'def Orphan():\n    pass\n',
    'app/run.py': 'def _start():\n    pass\n',
  });
  const names = async () => (await findDeadCode(await scanProject(root))).candidates.map((c) => `${c.path}:${c.name}`);
  try {
    assert.deepEqual(await names(), ['lib/dead.py:Orphan']);

    await writeFiles(root, { 'app/run.py': 'from lib.dead import Orphan\n\ndef _start():\n    Orphan()\n' });
    assert.deepEqual(await names(), []);

    await writeFiles(root, { 'app/run.py': 'def _start():\n    pass\n' });
    assert.deepEqual(await names(), ['lib/dead.py:Orphan']);
  } finally {
    await removeProject(root);
  }
});
