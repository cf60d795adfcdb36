export interface IndexConfig {
  /** Directory under the scanned root that holds the store; never scanned itself. */
  storeDirName: string;
  /** Optional gitignore-style file at the scanned root. */
  ignoreFileName: string;
  /** Directory basenames skipped wherever they appear. */
  skipDirs: string[];
  /** Skip every directory whose name starts with a dot. */
  skipHiddenDirs: boolean;
  /** Files larger than this are indexed as files but not parsed for symbols. */
  maxFileBytes: number;
}

export interface QueryDefaults {
  lookupMax: number;
  searchMax: number;
  refsMax: number;
  impactDepth: number;
  impactMax: number;
  deadCodeMax: number;
  symbolsMax: number;
  locateMax: number;
  todosMax: number;
  entryPointsMax: number;
  complexityMax: number;
  /** Complexity at or above which a function counts as high. */
  highComplexity: number;
}

export const STORE_DIR_NAME = '.symtrail';
export const IGNORE_FILE_NAME = '.symtrailignore';

export function defaultIndexConfig(): IndexConfig {
  return {
    storeDirName: STORE_DIR_NAME,
    ignoreFileName: IGNORE_FILE_NAME,
    skipDirs: [
      '.git', '.hg', '.svn',
      'node_modules', 'vendor', '__pycache__',
      '.idea', '.vscode', '.cursor',
      'dist', 'build', '.next',
    ],
    skipHiddenDirs: true,
    maxFileBytes: 1_000_000,
  };
}

export function defaultQueryDefaults(): QueryDefaults {
  return {
    lookupMax: 20,
    searchMax: 50,
    refsMax: 50,
    impactDepth: 3,
    impactMax: 100,
    deadCodeMax: 50,
    symbolsMax: 50,
    locateMax: 20,
    todosMax: 100,
    entryPointsMax: 100,
    complexityMax: 20,
    highComplexity: 10,
  };
}

function readPositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/**
 * Defaults, then environment (SYMTRAIL_MAX_FILE_BYTES), then explicit overrides.
 * The store directory is always part of the skip list.
 */
export function resolveIndexConfig(overrides?: Partial<IndexConfig>, env: NodeJS.ProcessEnv = process.env): IndexConfig {
  const defaults = defaultIndexConfig();
  const fromEnv: Partial<IndexConfig> = {};
  const maxFileBytes = readPositiveInt(env.SYMTRAIL_MAX_FILE_BYTES);
  if (maxFileBytes !== undefined) fromEnv.maxFileBytes = maxFileBytes;

  const merged: IndexConfig = { ...defaults, ...fromEnv, ...overrides };
  if (!merged.skipDirs.includes(merged.storeDirName)) {
    merged.skipDirs = [...merged.skipDirs, merged.storeDirName];
  }
  return merged;
}
