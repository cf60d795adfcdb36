export type ScanRootProblem = 'root_not_found' | 'root_not_a_directory';
export type IndexProblem = 'index_not_found' | 'index_corrupt' | 'index_incompatible';

/**
 * Base class for failures the caller is expected to act on. `reason` is a
 * stable machine-readable code; `hint` tells a human what to do next.
 */
export class SymtrailError extends Error {
  readonly reason: string;
  readonly hint?: string;

  constructor(reason: string, message: string, hint?: string) {
    super(message);
    this.name = 'SymtrailError';
    this.reason = reason;
    this.hint = hint;
  }
}

export class ScanRootError extends SymtrailError {
  readonly root: string;

  constructor(args: { root: string; reason: ScanRootProblem; message: string }) {
    super(args.reason, args.message);
    this.name = 'ScanRootError';
    this.root = args.root;
  }
}

export class QueryError extends SymtrailError {
  constructor(message: string) {
    super('invalid_query', message);
    this.name = 'QueryError';
  }
}

/** The persisted store is missing, corrupt, or from another schema version. */
export class IndexUnavailableError extends SymtrailError {
  readonly storeDir: string;

  constructor(args: { storeDir: string; reason: IndexProblem; message: string }) {
    super(args.reason, args.message, 'Run "symtrail scan <dir>" to (re)build the index');
    this.name = 'IndexUnavailableError';
    this.storeDir = args.storeDir;
  }
}

export class NotInIndexError extends SymtrailError {
  readonly file: string;

  constructor(file: string) {
    super('file_not_in_index', `file ${file} not found in index`, 'Paths are relative to the index root; run "symtrail stale" to check for new files');
    this.name = 'NotInIndexError';
    this.file = file;
  }
}

export class SymbolNotFoundError extends SymtrailError {
  readonly file: string;
  readonly symbol: string;

  constructor(file: string, symbol: string) {
    super('symbol_not_found', `symbol ${symbol} not found in ${file}`, `Run "symtrail outline ${file}" to list its declarations`);
    this.name = 'SymbolNotFoundError';
    this.file = file;
    this.symbol = symbol;
  }
}

export function isSymtrailError(e: unknown): e is SymtrailError {
  return e instanceof SymtrailError;
}
