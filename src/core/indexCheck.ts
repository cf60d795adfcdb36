import fs from 'fs-extra';
import { CodeIndex, INDEX_SCHEMA_VERSION } from './codeIndex';
import { IndexConfig, resolveIndexConfig } from './config';
import { isSymtrailError } from './errors';
import { entriesFilePath, metaFilePath, storeDir } from './paths';
import { loadIndex } from './store';
import { IndexMeta } from './types';

export interface IndexCheckResult {
  ok: boolean;
  problems: string[];
  expected: { schemaVersion: number };
  found: {
    storeDir: string;
    metaPath: string;
    metaExists: boolean;
    entriesPath: string;
    entriesExists: boolean;
    meta: IndexMeta | null;
  };
  hint: string;
}

/** Reports whether the store at `root` loads, without throwing for any store problem. */
export async function checkIndex(root: string, config: IndexConfig = resolveIndexConfig()): Promise<IndexCheckResult> {
  const metaPath = metaFilePath(root, config);
  const entriesPath = entriesFilePath(root, config);
  const problems: string[] = [];
  let index: CodeIndex | null = null;

  try {
    index = await loadIndex(root, config);
  } catch (e) {
    if (!isSymtrailError(e)) throw e;
    problems.push(e.reason);
  }

  const ok = problems.length === 0;
  return {
    ok,
    problems,
    expected: { schemaVersion: INDEX_SCHEMA_VERSION },
    found: {
      storeDir: storeDir(root, config),
      metaPath,
      metaExists: await fs.pathExists(metaPath),
      entriesPath,
      entriesExists: await fs.pathExists(entriesPath),
      meta: index ? index.meta() : null,
    },
    hint: ok ? 'ok' : 'Rebuild the index: symtrail scan <dir>',
  };
}
