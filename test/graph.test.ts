import test from 'node:test';
import assert from 'node:assert/strict';
import type { CodeIndex } from '../src/core/codeIndex';
import { NotInIndexError } from '../src/core/errors';
import { buildFocusedGraph, buildImportGraph, findRelatedFiles, formatGraphDot, formatRelated } from '../src/core/graph';
import { ImportResolver, extractImportSpecifiers } from '../src/core/imports';
import { scanProject } from '../src/core/store';
import { createProject, removeProject } from './helpers';

const files = {
  'cmd/main.go': [
    'package main',
    '',
    'import (',
    '\t"fmt"',
    '\t"example.com/proj/pkg/store"',
    ')',
    '',
    'func main() { fmt.Println(store.Open()) }',
    '',
  ].join('\n'),
  'pkg/store/store.go': 'package store\n\nfunc Open() int { return 1 }\n',
  'pkg/store/store_test.go': 'package store\n\nimport "testing"\n\nfunc TestOpen(t *testing.T) {}\n',
  'web/index.ts': "import { helper } from './lib/helper';\nimport React from 'react';\nexport const x = helper();\n",
  'web/lib/helper.ts': 'export function helper() { return 1; }\n',
  'web/lib/helper.test.ts': "import { helper } from './helper';\n",
  'web/legacy.js': "const h = require('./lib/helper.js');\n",
  'py/app/__init__.py': '',
  'py/app/main.py': 'from . import util\nfrom .models import User\nimport os\n',
  'py/app/models.py': 'class User:\n    pass\n',
};

async function withIndex(fn: (index: CodeIndex) => Promise<void>): Promise<void> {
  const root = await createProject(files);
  try {
    await fn(await scanProject(root));
  } finally {
    await removeProject(root);
  }
}

test('imports: specifiers per language', () => {
  assert.deepEqual(
    extractImportSpecifiers('a.go', ['import "os"', 'import (', '\tf "fmt"', '\t_ "embed"', ')', 'var x = "not/an/import"']),
    ['os', 'fmt', 'embed']
  );
  assert.deepEqual(
    extractImportSpecifiers('a.ts', ["export { a } from './a';", "import './side-effect';", 'const x = require("./x");']),
    ['./a', './side-effect', './x']
  );
  assert.deepEqual(
    extractImportSpecifiers('a.py', ['from ..core import thing', 'import pkg.mod', '    import late']),
    ['..core', 'pkg.mod', 'late']
  );
  assert.deepEqual(extractImportSpecifiers('README.md', ['import "x"']), []);
});

test('imports: resolver maps specifiers to indexed files', () => {
  const resolver = new ImportResolver(['src/a.ts', 'src/lib/index.ts', 'pkg/util/u.go', 'pkg/util/u_test.go', 'app/core/__init__.py', 'app/api/views.py']);
  assert.deepEqual(resolver.resolve('src/b.ts', './a'), ['src/a.ts']);
  assert.deepEqual(resolver.resolve('src/b.ts', './a.js'), ['src/a.ts']);
  assert.deepEqual(resolver.resolve('src/b.ts', './lib'), ['src/lib/index.ts']);
  assert.deepEqual(resolver.resolve('src/b.ts', 'lodash'), []);
  assert.deepEqual(resolver.resolve('cmd/x.go', 'github.com/me/proj/pkg/util'), ['pkg/util/u.go']);
  assert.deepEqual(resolver.resolve('app/api/views.py', '..core'), ['app/core/__init__.py']);
  assert.deepEqual(resolver.resolve('app/api/urls.py', '.views'), ['app/api/views.py']);
  assert.deepEqual(resolver.resolve('manage.py', 'app.api.views'), ['app/api/views.py']);
});

test('imports: a Go import path reaches every directory matching one of its suffixes', () => {
  const resolver = new ImportResolver(['svc/util/a.go', 'util/b.go', 'util/c.go', 'other/util/d.go']);
  assert.deepEqual(resolver.resolve('cmd/x.go', 'example.com/svc/util'), ['svc/util/a.go', 'util/b.go', 'util/c.go']);
});

test('graph: edges, fan-in/fan-out ordering and stats', async () => {
  await withIndex(async (index) => {
    const g = await buildImportGraph(index);
    assert.deepEqual(g.edges.map((e) => `${e.from} -> ${e.to}`), [
      'cmd/main.go -> pkg/store/store.go',
      'py/app/main.py -> py/app/__init__.py',
      'py/app/main.py -> py/app/models.py',
      'web/index.ts -> web/lib/helper.ts',
      'web/legacy.js -> web/lib/helper.ts',
      'web/lib/helper.test.ts -> web/lib/helper.ts',
    ]);
    assert.deepEqual(g.nodes.map((n) => n.path), [
      'web/lib/helper.ts',
      'pkg/store/store.go',
      'py/app/__init__.py',
      'py/app/models.py',
      'cmd/main.go',
      'py/app/main.py',
      'web/index.ts',
      'web/legacy.js',
      'web/lib/helper.test.ts',
    ]);
    assert.equal(g.stats.totalFiles, 9);
    assert.equal(g.stats.totalEdges, 6);
    assert.deepEqual(g.stats.mostImported, { path: 'web/lib/helper.ts', fanIn: 3, fanOut: 0 });
    assert.deepEqual(g.stats.mostDependent, { path: 'py/app/main.py', fanIn: 0, fanOut: 2 });
  });
});

test('graph: focused traversal respects depth in both directions', async () => {
  await withIndex(async (index) => {
    const one = await buildFocusedGraph(index, 'web/index.ts', 1);
    assert.deepEqual(one.edges, [{ from: 'web/index.ts', to: 'web/lib/helper.ts' }]);
    assert.equal(formatGraphDot(one), 'digraph imports {\n  rankdir=LR;\n  "web/index.ts" -> "web/lib/helper.ts";\n}');

    const two = await buildFocusedGraph(index, 'web/index.ts', 2);
    assert.deepEqual(two.nodes.map((n) => n.path).sort(), [
      'web/index.ts',
      'web/legacy.js',
      'web/lib/helper.test.ts',
      'web/lib/helper.ts',
    ]);
    assert.equal(two.edges.length, 3);

    const unlimited = await buildFocusedGraph(index, 'web/index.ts', 0);
    assert.deepEqual(unlimited.edges, two.edges);
    assert.equal(unlimited.focus, 'web/index.ts');
  });
});

test('graph: a file with no imports is its own neighbourhood', async () => {
  await withIndex(async (index) => {
    const g = await buildFocusedGraph(index, 'pkg/store/store_test.go', 3);
    assert.deepEqual(g.nodes, [{ path: 'pkg/store/store_test.go', fanIn: 0, fanOut: 0 }]);
    assert.deepEqual(g.edges, []);
    await assert.rejects(buildFocusedGraph(index, 'missing.go', 1), NotInIndexError);
  });
});

test('related: imports, importers and conventional tests', async () => {
  await withIndex(async (index) => {
    const helper = await findRelatedFiles(index, 'web/lib/helper.ts');
    assert.deepEqual(helper, {
      file: 'web/lib/helper.ts',
      imports: [],
      importedBy: ['web/index.ts', 'web/legacy.js', 'web/lib/helper.test.ts'],
      tests: ['web/lib/helper.test.ts'],
    });

    const store = await findRelatedFiles(index, 'pkg/store/store.go');
    assert.equal(
      formatRelated(store),
      'Related files for pkg/store/store.go:\n\nImported by (1):\n  cmd/main.go\n\nTest files (1):\n  pkg/store/store_test.go'
    );
  });
});
