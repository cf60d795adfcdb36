import path from 'path';
import type { IndexConfig } from './config';

export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export const ROOT_PACKAGE = '(root)';
export const NO_EXTENSION = '(none)';

/** Containing directory of an index-relative path, or `(root)`. */
export function packageOf(relPath: string): string {
  const dir = path.posix.dirname(toPosixPath(relPath));
  return dir === '.' ? ROOT_PACKAGE : dir;
}

export function extensionOf(relPath: string): string {
  return path.posix.extname(toPosixPath(relPath));
}

export function storeDir(root: string, config: Pick<IndexConfig, 'storeDirName'>): string {
  return path.join(root, config.storeDirName, 'index');
}

export function entriesFilePath(root: string, config: Pick<IndexConfig, 'storeDirName'>): string {
  return path.join(storeDir(root, config), 'index.json');
}

export function metaFilePath(root: string, config: Pick<IndexConfig, 'storeDirName'>): string {
  return path.join(storeDir(root, config), 'meta.json');
}

/**
 * Normalises a user-supplied file argument to the index's root-relative POSIX
 * form. Absolute paths are made relative to `root`.
 */
export function toIndexPath(root: string, filePath: string): string {
  const rel = path.isAbsolute(filePath) ? path.relative(root, filePath) : filePath;
  return path.posix.normalize(toPosixPath(rel)).replace(/^\.\//, '');
}
