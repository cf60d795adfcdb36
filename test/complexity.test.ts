import test from 'node:test';
import assert from 'node:assert/strict';
import { analyzeComplexity, countSignatureParams, formatComplexity } from '../src/core/complexity';
import { NotInIndexError } from '../src/core/errors';
import { scanProject } from '../src/core/store';
import { createProject, removeProject } from './helpers';

const files = {
  'calc/calc.go': [
    'package calc',
    '',
    'func Classify(n int, strict bool) string {',
    '\tif n < 0 && strict {',
    '\t\treturn "negative"',
    '\t}',
    '\tfor i := 0; i < n; i++ {',
    '\t\tswitch {',
    '\t\tcase i > 10:',
    '\t\t\treturn "big"',
    '\t\tdefault:',
    '\t\t}',
    '\t}',
    '\treturn "small"',
    '}',
    '',
    'func Id(x int) int { return x }',
    '',
    'type Acc struct{}',
    '',
    'func (a *Acc) Add(xs ...int) {}',
    '',
  ].join('\n'),
  'web/check.ts': [
    'export function check(items: Map<string, number>, limit = 3) {',
    '  for (const [k, v] of items) {',
    "    if (v > limit || k === '') {",
    '      return false;',
    '    }',
    '  }',
    '  return true;',
    '}',
    '',
  ].join('\n'),
  'jobs/run.py': 'def run(self_check, *args, retries=3):\n    for job in args:\n        if job and retries:\n            pass\n',
};

test('complexity: Go from the syntax tree, others from line patterns', async () => {
  const root = await createProject(files);
  try {
    const res = await analyzeComplexity(await scanProject(root));
    assert.deepEqual(res.functions.map((f) => `${f.name}@${f.path}:${f.line} c=${f.complexity} d=${f.maxDepth} p=${f.params}`), [
      'Classify@calc/calc.go:3 c=7 d=2 p=2',
      'run@jobs/run.py:1 c=4 d=2 p=3',
      'check@web/check.ts:1 c=4 d=2 p=2',
      'Id@calc/calc.go:17 c=1 d=0 p=1',
      'Acc.Add@calc/calc.go:21 c=1 d=0 p=1',
    ]);
    assert.equal(res.functions[0].lines, 13);
    assert.equal(res.functions[1].lines, 4);
    assert.equal(res.functions[2].endLine, 8);
    assert.equal(res.totalFunctions, 5);
    assert.equal(res.avgComplexity, 17 / 5);
    assert.equal(res.maxComplexity, 7);
    assert.equal(res.highComplexityCount, 0);
  } finally {
    await removeProject(root);
  }
});

test('complexity: threshold, limit, single file and text output', async () => {
  const root = await createProject(files);
  try {
    const index = await scanProject(root);
    const res = await analyzeComplexity(index, { minComplexity: 4, max: 2, highThreshold: 4 });
    assert.equal(
      formatComplexity(res),
      [
        '5 functions, average complexity 3.4, max 7, 3 high',
        '',
        `  ${'7'.padStart(4)}  ${'calc/calc.go:3'.padEnd(30)} Classify (lines 13, depth 2, params 2)`,
        `  ${'4'.padStart(4)}  ${'jobs/run.py:1'.padEnd(30)} run (lines 4, depth 2, params 3)`,
      ].join('\n')
    );

    const one = await analyzeComplexity(index, { file: 'web/check.ts' });
    assert.deepEqual(one.functions.map((f) => f.name), ['check']);
    assert.equal(one.totalFunctions, 1);

    await assert.rejects(analyzeComplexity(index, { file: 'missing.go' }), NotInIndexError);
    assert.equal(
      formatComplexity({ functions: [], totalFunctions: 0, avgComplexity: 0, maxComplexity: 0, highComplexityCount: 0 }),
      'No functions found'
    );
  } finally {
    await removeProject(root);
  }
});

test('complexity: parameters counted from a signature', () => {
  assert.equal(countSignatureParams('def f(self, a: int = 3) -> int:'), 1);
  assert.equal(countSignatureParams('def h(a, /, b, *, c):'), 3);
  assert.equal(countSignatureParams('export function g() {'), 0);
  assert.equal(countSignatureParams('function on(cb: (x: number) => void, n: Map<string, number>) {'), 2);
  assert.equal(countSignatureParams('@cache\ndef cached(cls, key):'), 1);
  assert.equal(countSignatureParams('const x = 1'), 0);
});
