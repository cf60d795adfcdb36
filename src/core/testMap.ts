import path from 'path';
import { CodeIndex } from './codeIndex';
import { isTestFile } from './deadCode';
import { findTestFiles } from './graph';
import { compareStrings } from './paths';
import { TestMapEntry, TestMapResult } from './types';

const SOURCE_EXTENSIONS = new Set(['.go', '.py', '.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs']);

export type TestMapFilter = 'all' | 'tested' | 'untested';

export interface TestMapOptions {
  pathPrefix?: string;
  filter?: TestMapFilter;
  /** 0 or undefined keeps every entry. */
  max?: number;
}

/** Test files by name, plus anything under a `__tests__` directory and Python `*_test.py`. */
export function isTestPath(relPath: string): boolean {
  return isTestFile(relPath) || relPath.includes('__tests__/') || /_test\.py$/.test(relPath);
}

/**
 * Each source file with the conventional test files that exist for it. The
 * summary covers every source file under the prefix, before the filter.
 */
export function mapTests(index: CodeIndex, options: TestMapOptions = {}): TestMapResult {
  const prefix = options.pathPrefix ?? '';
  const sources = index
    .filePaths()
    .filter((p) => p.startsWith(prefix) && SOURCE_EXTENSIONS.has(path.posix.extname(p)) && !isTestPath(p))
    .sort(compareStrings);

  const all: TestMapEntry[] = sources.map((source) => ({ source, tests: findTestFiles(index, source) }));
  const tested = all.filter((e) => e.tests.length > 0).length;

  const filter = options.filter ?? 'all';
  const kept = all.filter((e) => filter === 'all' || (filter === 'tested') === (e.tests.length > 0));
  const max = options.max && options.max > 0 ? options.max : kept.length;

  return {
    entries: kept.slice(0, max),
    summary: {
      sourceFiles: all.length,
      testedFiles: tested,
      untestedFiles: all.length - tested,
      coverageRatio: all.length === 0 ? 0 : tested / all.length,
    },
  };
}

export function formatTestMap(r: TestMapResult): string {
  const { sourceFiles, testedFiles, coverageRatio } = r.summary;
  const out = [`Test map: ${testedFiles}/${sourceFiles} source files have tests (${Math.round(coverageRatio * 100)}%)`];
  if (r.entries.length === 0) {
    out.push('', '  No matching source files');
    return out.join('\n');
  }
  out.push('');
  for (const e of r.entries) {
    out.push(e.tests.length > 0 ? `  ${e.source} -> ${e.tests.join(', ')}` : `  ${e.source} (untested)`);
  }
  return out.join('\n');
}
