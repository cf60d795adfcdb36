import test from 'node:test';
import assert from 'node:assert/strict';
import { scanProject } from '../src/core/store';
import { formatTestMap, isTestPath, mapTests } from '../src/core/testMap';
import { createProject, removeProject } from './helpers';

const files = {
  'pkg/cache.go': 'package pkg\n',
  'pkg/cache_test.go': 'package pkg\n',
  'pkg/store.go': 'package pkg\n',
  'web/app.ts': 'export const app = 1;\n',
  'web/app.test.ts': "import { app } from './app';\n",
  'web/__tests__/app.ts': "import { app } from '../app';\n",
  'lib/parse.py': 'def parse():\n    pass\n',
  'lib/tests/test_parse.py': 'def test_parse():\n    pass\n',
  'README.md': '# readme\n',
};

test('test map: source files with the tests found for them', async () => {
  const root = await createProject(files);
  try {
    const res = mapTests(await scanProject(root));
    assert.deepEqual(res.entries, [
      { source: 'lib/parse.py', tests: ['lib/tests/test_parse.py'] },
      { source: 'pkg/cache.go', tests: ['pkg/cache_test.go'] },
      { source: 'pkg/store.go', tests: [] },
      { source: 'web/app.ts', tests: ['web/app.test.ts', 'web/__tests__/app.ts'] },
    ]);
    assert.deepEqual(res.summary, { sourceFiles: 4, testedFiles: 3, untestedFiles: 1, coverageRatio: 0.75 });
  } finally {
    await removeProject(root);
  }
});

test('test map: filters keep the summary of every source under the prefix', async () => {
  const root = await createProject(files);
  try {
    const index = await scanProject(root);
    assert.equal(
      formatTestMap(mapTests(index, { filter: 'untested' })),
      'Test map: 3/4 source files have tests (75%)\n\n  pkg/store.go (untested)'
    );
    assert.equal(
      formatTestMap(mapTests(index, { pathPrefix: 'web/' })),
      'Test map: 1/1 source files have tests (100%)\n\n  web/app.ts -> web/app.test.ts, web/__tests__/app.ts'
    );
    assert.equal(
      formatTestMap(mapTests(index, { pathPrefix: 'pkg/store', filter: 'tested' })),
      'Test map: 0/1 source files have tests (0%)\n\n  No matching source files'
    );
    assert.deepEqual(mapTests(index, { max: 2 }).entries.map((e) => e.source), ['lib/parse.py', 'pkg/cache.go']);
  } finally {
    await removeProject(root);
  }
});

test('test map: test paths', () => {
  assert.equal(isTestPath('web/__tests__/app.ts'), true);
  assert.equal(isTestPath('lib/parse_test.py'), true);
  assert.equal(isTestPath('pkg/cache_test.go'), true);
  assert.equal(isTestPath('pkg/cache.go'), false);
});
