import fs from 'fs-extra';
import path from 'path';
import ignore, { Ignore } from 'ignore';
import { IndexConfig } from './config';

/** Non-empty, non-comment lines of the ignore file, in order. */
export async function loadIgnorePatterns(root: string, fileName: string): Promise<string[]> {
  const ignorePath = path.join(root, fileName);
  if (!await fs.pathExists(ignorePath)) return [];
  const raw = await fs.readFile(ignorePath, 'utf-8');
  return raw
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith('#'));
}

/**
 * Decides which paths a walk skips: the configured noise directories, hidden
 * directories, and the project's gitignore-style rules. Paths are
 * root-relative POSIX.
 */
export class IgnoreMatcher {
  private readonly skipDirs: ReadonlySet<string>;
  private readonly skipHiddenDirs: boolean;
  private readonly rules: Ignore;

  constructor(patterns: string[], config: Pick<IndexConfig, 'skipDirs' | 'skipHiddenDirs'>) {
    this.skipDirs = new Set(config.skipDirs);
    this.skipHiddenDirs = config.skipHiddenDirs;
    this.rules = ignore().add(patterns);
  }

  ignoresDir(relPath: string): boolean {
    if (!relPath) return false;
    const name = path.posix.basename(relPath);
    if (this.skipDirs.has(name)) return true;
    if (this.skipHiddenDirs && name.startsWith('.')) return true;
    return this.rules.ignores(`${relPath}/`);
  }

  ignoresFile(relPath: string): boolean {
    if (!relPath) return false;
    return this.rules.ignores(relPath);
  }
}

export async function loadIgnoreMatcher(root: string, config: IndexConfig): Promise<IgnoreMatcher> {
  return new IgnoreMatcher(await loadIgnorePatterns(root, config.ignoreFileName), config);
}
