import test from 'node:test';
import assert from 'node:assert/strict';
import { JavaScriptAdapter } from '../src/core/parser/javascript';

const source = [
  "import { x } from './x';",
  '// function commented() {}',
  'export function alpha(a: number): number {',
  '  const s = `${a} }`;',
  '  return a + 1;',
  '}',
  '',
  'export class Greeter {',
  '  private name: string;',
  '  constructor(name: string) {',
  '    this.name = name;',
  '  }',
  '  greet(): string {',
  '    if (this.name) {',
  "      return 'hi';",
  '    }',
  "    return '';",
  '  }',
  '  private hidden() {}',
  '  _internal() {}',
  '}',
  '',
  'export interface Shape {',
  '  area(): number;',
  '}',
  '',
  'export const enum Color { Red, Green }',
  'export type Pair = [number, number];',
  'const helper = () => 1;',
  '/*',
  'function insideComment() {}',
  '*/',
  '',
].join('\n');

test('javascript: top-level declarations and class methods', () => {
  const symbols = new JavaScriptAdapter().extract('src/greeter.ts', source);
  assert.deepEqual(
    symbols.map((s) => `${s.kind}:${s.name}:${s.line}-${s.endLine}`),
    [
      'func:alpha:3-6',
      'class:Greeter:8-21',
      'method:constructor:10-12',
      'method:greet:13-18',
      'method:hidden:19-19',
      'method:_internal:20-20',
      'interface:Shape:23-25',
      'enum:Color:27-27',
      'type:Pair:28-28',
      'const:helper:29-29',
    ]
  );
});

test('javascript: export and visibility rules', () => {
  const byName = new Map(new JavaScriptAdapter().extract('a.ts', source).map((s) => [s.name, s]));
  assert.equal(byName.get('alpha')?.exported, true);
  assert.equal(byName.get('Greeter')?.exported, true);
  assert.equal(byName.get('helper')?.exported, false);
  assert.equal(byName.get('greet')?.exported, true);
  assert.equal(byName.get('hidden')?.exported, false);
  assert.equal(byName.get('_internal')?.exported, false);
  assert.equal(byName.get('greet')?.parent, 'Greeter');
});

test('javascript: class signatures stop at the opening brace', () => {
  const byName = new Map(new JavaScriptAdapter().extract('a.ts', source).map((s) => [s.name, s]));
  assert.equal(byName.get('Greeter')?.signature, 'export class Greeter');
  assert.equal(byName.get('alpha')?.signature, 'export function alpha(a: number): number {');
});

test('javascript: braces inside strings do not change nesting', () => {
  const symbols = new JavaScriptAdapter().extract('a.js', [
    'const open = "{";',
    "const tpl = `${'{'}`;",
    'export function after() {}',
  ].join('\n'));
  assert.deepEqual(symbols.map((s) => s.name), ['open', 'tpl', 'after']);
});

test('javascript: decorators and require lines are not declarations', () => {
  const symbols = new JavaScriptAdapter().extract('a.ts', [
    "require('./setup');",
    '@Component()',
    'export class Widget {}',
  ].join('\n'));
  assert.deepEqual(symbols.map((s) => `${s.kind}:${s.name}`), ['class:Widget']);
});

test('javascript: anonymous default exports are named default', () => {
  const symbols = new JavaScriptAdapter().extract('a.ts', [
    'export default class extends Base {',
    '  run() {}',
    '}',
    'export default function () {}',
    'class Plain implements Shape {}',
  ].join('\n'));
  assert.deepEqual(
    symbols.map((s) => `${s.kind}:${s.name}:${s.parent}`),
    ['class:default:', 'method:run:default', 'func:default:', 'class:Plain:']
  );
  assert.equal(symbols[0].signature, 'export default class extends Base');
});
