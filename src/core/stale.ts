import fs, { Stats } from 'fs-extra';
import { CodeIndex } from './codeIndex';
import { IndexConfig, resolveIndexConfig } from './config';
import { StaleReport } from './types';
import { listProjectFiles } from './walk';

async function statIfPresent(absPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(absPath);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
    throw e;
  }
}

/**
 * Compares the index with the live tree, walked with the same skip and
 * ignore rules as a scan. A file counts as modified when its mtime is later
 * than the moment the scan started. Nothing is written.
 */
export async function checkStaleness(index: CodeIndex, config: IndexConfig = resolveIndexConfig()): Promise<StaleReport> {
  const scannedAtMs = Date.parse(index.scannedAt);
  const indexed = new Set(index.filePaths());
  const newFiles: string[] = [];
  const modifiedFiles: string[] = [];

  for (const rel of await listProjectFiles(index.root, config)) {
    if (!indexed.has(rel)) {
      newFiles.push(rel);
      continue;
    }
    const stat = await statIfPresent(index.absolutePath(rel));
    // Gone between the walk and the stat: leave it counted as deleted.
    if (!stat) continue;
    indexed.delete(rel);
    if (Math.floor(stat.mtimeMs) > scannedAtMs) modifiedFiles.push(rel);
  }

  const deletedFiles = [...indexed].sort();
  newFiles.sort();
  modifiedFiles.sort();

  return {
    root: index.root,
    scannedAt: index.scannedAt,
    isStale: newFiles.length + deletedFiles.length + modifiedFiles.length > 0,
    newFiles,
    deletedFiles,
    modifiedFiles,
    summary: { new: newFiles.length, deleted: deletedFiles.length, modified: modifiedFiles.length },
  };
}

export function formatStale(r: StaleReport): string {
  const out = [`Index scanned at ${r.scannedAt}`];
  if (!r.isStale) {
    out.push('', 'No changes detected; index is up to date.');
    return out.join('\n');
  }
  const section = (title: string, files: string[]) => {
    if (files.length === 0) return;
    out.push('', `${title}: ${files.length}`);
    for (const f of files) out.push(`  ${f}`);
  };
  section('New files (not in index)', r.newFiles);
  section('Deleted files (in index but missing from disk)', r.deletedFiles);
  section('Modified files (changed since last scan)', r.modifiedFiles);
  out.push(
    '',
    `Summary: ${r.summary.new} new, ${r.summary.deleted} deleted, ${r.summary.modified} modified. Run "symtrail scan" to update.`
  );
  return out.join('\n');
}
