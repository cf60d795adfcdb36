import path from 'path';
import { CodeIndex } from '../../core/codeIndex';
import { IndexConfig, resolveIndexConfig } from '../../core/config';
import { isSymtrailError } from '../../core/errors';
import { loadIndex, findIndexRoot } from '../../core/store';
import { toIndexPath } from '../../core/paths';
import type { CLIError, CLIResult } from '../types';
import { error, ErrorHints, ErrorReasons } from '../types';

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

export interface IndexContext {
  root: string;
  config: IndexConfig;
  index: CodeIndex;
}

/**
 * Finds the store at or above `startPath` and loads it. Store problems come
 * back as a CLIError carrying the rescan hint.
 */
export async function resolveIndexContext(startPath: string): Promise<IndexContext | CLIError> {
  const config = resolveIndexConfig();
  const start = path.resolve(startPath);
  const root = await findIndexRoot(start, config);
  if (!root) {
    return error(ErrorReasons.INDEX_NOT_FOUND, {
      message: `no index found at or above ${start}`,
      hint: ErrorHints.INDEX_NOT_FOUND,
    });
  }
  try {
    const index = await loadIndex(root, config);
    return { root, config, index };
  } catch (e) {
    const failure = toCLIError(e);
    if (failure) return failure;
    throw e;
  }
}

/** CLIError for typed core failures; null for anything else. */
export function toCLIError(e: unknown): CLIError | null {
  if (!isSymtrailError(e)) return null;
  return error(e.reason, { message: e.message, hint: e.hint });
}

/** A file argument as the index stores it: root-relative, forward slashes. */
export function resolveFileArgument(ctx: IndexContext, file: string): string {
  const abs = path.isAbsolute(file) ? file : path.resolve(file);
  const fromCwd = toIndexPath(ctx.root, abs);
  if (ctx.index.hasFile(fromCwd)) return fromCwd;
  return toIndexPath(ctx.root, file);
}

/**
 * A file or directory argument. It is read from the working directory when
 * that names indexed content, and from the index root otherwise.
 */
export function resolveScopeArgument(ctx: IndexContext, scope: string): string {
  const fromCwd = toIndexPath(ctx.root, path.resolve(scope));
  const dirPrefix = fromCwd === '.' ? '' : `${fromCwd}/`;
  if (!fromCwd.startsWith('..') && (ctx.index.hasFile(fromCwd) || ctx.index.filePaths().some((p) => p.startsWith(dirPrefix)))) {
    return fromCwd;
  }
  return toIndexPath(ctx.root, scope);
}

/** Runs a handler body, turning typed core failures into CLIError results. */
export async function catchCoreErrors(
  body: () => Promise<CLIResult | CLIError>
): Promise<CLIResult | CLIError> {
  try {
    return await body();
  } catch (e) {
    const failure = toCLIError(e);
    if (failure) return failure;
    throw e;
  }
}
