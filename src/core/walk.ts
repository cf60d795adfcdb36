import { glob } from 'glob';
import { IndexConfig } from './config';
import { loadIgnoreMatcher } from './ignore';

/** The subset of glob's Path objects the ignore hooks look at. */
interface WalkPath {
  relativePosix(): string;
  isDirectory(): boolean;
}

/**
 * Every indexable file under `root`, root-relative with forward slashes,
 * sorted. Directories rejected by the ignore rules are not descended into.
 */
export async function listProjectFiles(root: string, config: IndexConfig): Promise<string[]> {
  const matcher = await loadIgnoreMatcher(root, config);
  const files = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
    ignore: {
      ignored: (p: WalkPath) => (p.isDirectory() ? matcher.ignoresDir(p.relativePosix()) : matcher.ignoresFile(p.relativePosix())),
      childrenIgnored: (p: WalkPath) => matcher.ignoresDir(p.relativePosix()),
    },
  });
  return files.sort();
}
