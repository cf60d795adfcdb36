import test from 'node:test';
import assert from 'node:assert/strict';
import { ExtractorRegistry, createDefaultRegistry } from '../src/core/parser/registry';
import type { LanguageAdapter } from '../src/core/parser/adapter';
import type { SymbolInfo } from '../src/core/types';

class FakeAdapter implements LanguageAdapter {
  readonly variant = 'brace-heuristic' as const;

  constructor(private readonly id: string, private readonly exts: string[]) {}

  getLanguageId(): string {
    return this.id;
  }

  getSupportedFileExtensions(): string[] {
    return this.exts;
  }

  extract(): SymbolInfo[] {
    return [];
  }
}

test('registry: default registry covers go, javascript and python', () => {
  const registry = createDefaultRegistry();
  assert.deepEqual(registry.extensions(), ['.cjs', '.go', '.js', '.jsx', '.mjs', '.py', '.ts', '.tsx']);
  assert.equal(registry.adapterFor('pkg/a.go')?.variant, 'structured');
  assert.equal(registry.adapterFor('web/app.tsx')?.variant, 'brace-heuristic');
  assert.equal(registry.adapterFor('tool.py')?.variant, 'indent-heuristic');
  assert.equal(registry.supports('README.md'), false);
});

test('registry: unsupported files extract to nothing', () => {
  assert.deepEqual(createDefaultRegistry().extract('notes.txt', 'function nope() {}'), []);
});

test('registry: two adapters claiming one extension is rejected', () => {
  assert.throws(
    () => new ExtractorRegistry([new FakeAdapter('one', ['.x']), new FakeAdapter('two', ['.y', '.x'])]),
    { message: 'extension .x claimed by both one and two' }
  );
});
