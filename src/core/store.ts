import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { CodeIndex, INDEX_SCHEMA_VERSION } from './codeIndex';
import { IndexConfig, resolveIndexConfig } from './config';
import { IndexUnavailableError, ScanRootError } from './errors';
import { Logger, createLogger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { entriesFilePath, metaFilePath, packageOf, storeDir } from './paths';
import { readTextFile } from './textFiles';
import { Entry } from './types';
import { readToolVersion } from './version';
import { listProjectFiles } from './walk';

export const EntrySchema = z.object({
  name: z.string(),
  kind: z.enum(['file', 'func', 'method', 'type', 'struct', 'class', 'interface', 'enum', 'const', 'var']),
  path: z.string(),
  line: z.number().int().nonnegative(),
  package: z.string(),
  exported: z.boolean(),
});

export const IndexMetaSchema = z.object({
  schemaVersion: z.number().int(),
  root: z.string(),
  scannedAt: z.string(),
  version: z.string(),
  fileCount: z.number().int().nonnegative(),
  packageCount: z.number().int().nonnegative(),
  extensions: z.record(z.number().int().nonnegative()),
});

export interface ScanProgress {
  totalFiles: number;
  processedFiles: number;
  currentFile?: string;
}

export interface ScanOptions {
  config?: IndexConfig;
  registry?: ExtractorRegistry;
  log?: Logger;
  onProgress?: (p: ScanProgress) => void;
}

async function assertScanRoot(root: string): Promise<void> {
  const stat = await fs.stat(root).catch((e: unknown) => {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
    throw e;
  });
  if (!stat) {
    throw new ScanRootError({ root, reason: 'root_not_found', message: `directory not found: ${root}` });
  }
  if (!stat.isDirectory()) {
    throw new ScanRootError({ root, reason: 'root_not_a_directory', message: `not a directory: ${root}` });
  }
}

/**
 * Walks `rootArg` and builds a fresh index: one file entry per file followed
 * by one entry per extracted symbol. A file that cannot be read or parsed
 * keeps its file entry and contributes no symbols.
 */
export async function scanProject(rootArg: string, options: ScanOptions = {}): Promise<CodeIndex> {
  const root = path.resolve(rootArg);
  const config = options.config ?? resolveIndexConfig();
  const registry = options.registry ?? createDefaultRegistry();
  const log = options.log ?? createLogger({ component: 'scan' });
  const scannedAt = new Date().toISOString();

  await assertScanRoot(root);
  const files = await listProjectFiles(root, config);
  const entries: Entry[] = [];

  for (let i = 0; i < files.length; i++) {
    const rel = files[i];
    const pkg = packageOf(rel);
    options.onProgress?.({ totalFiles: files.length, processedFiles: i, currentFile: rel });
    entries.push({ name: path.posix.basename(rel), kind: 'file', path: rel, line: 0, package: pkg, exported: false });

    if (!registry.supports(rel)) continue;
    const abs = path.join(root, rel);
    try {
      const stat = await fs.stat(abs);
      if (stat.size > config.maxFileBytes) {
        log.skip(rel, 'too_large', { size: stat.size, maxFileBytes: config.maxFileBytes });
        continue;
      }
      const content = await readTextFile(abs);
      if (content === null) {
        log.skip(rel, 'binary');
        continue;
      }
      for (const sym of registry.extract(rel, content)) {
        entries.push({ name: sym.name, kind: sym.kind, path: rel, line: sym.line, package: pkg, exported: sym.exported });
      }
    } catch (e) {
      log.skip(rel, 'extract_failed', { err: e });
    }
  }
  options.onProgress?.({ totalFiles: files.length, processedFiles: files.length });

  return new CodeIndex({ root, entries, scannedAt, version: readToolVersion() });
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  await fs.rename(tmp, filePath);
}

/** Writes entries then metadata; meta.json appearing last marks the store complete. */
export async function persistIndex(index: CodeIndex, config: IndexConfig = resolveIndexConfig()): Promise<string> {
  const dir = storeDir(index.root, config);
  await fs.ensureDir(dir);
  await writeJsonAtomic(entriesFilePath(index.root, config), index.entries);
  await writeJsonAtomic(metaFilePath(index.root, config), index.meta());
  return dir;
}

async function readJsonDocument(filePath: string, storeDirPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    const missing = e instanceof Error && 'code' in e && e.code === 'ENOENT';
    throw new IndexUnavailableError({
      storeDir: storeDirPath,
      reason: missing ? 'index_not_found' : 'index_corrupt',
      message: missing ? `no index found at ${storeDirPath}` : `cannot read ${filePath}: ${String(e)}`,
    });
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new IndexUnavailableError({
      storeDir: storeDirPath,
      reason: 'index_corrupt',
      message: `${path.basename(filePath)} is not valid JSON`,
    });
  }
}

export async function loadIndex(rootArg: string, config: IndexConfig = resolveIndexConfig()): Promise<CodeIndex> {
  const root = path.resolve(rootArg);
  const dir = storeDir(root, config);

  const metaRaw = await readJsonDocument(metaFilePath(root, config), dir);
  const version = z.object({ schemaVersion: z.number() }).safeParse(metaRaw);
  if (version.success && version.data.schemaVersion !== INDEX_SCHEMA_VERSION) {
    throw new IndexUnavailableError({
      storeDir: dir,
      reason: 'index_incompatible',
      message: `index schema version ${version.data.schemaVersion} is not supported (expected ${INDEX_SCHEMA_VERSION})`,
    });
  }
  const meta = IndexMetaSchema.safeParse(metaRaw);
  if (!meta.success) {
    throw new IndexUnavailableError({ storeDir: dir, reason: 'index_corrupt', message: 'meta.json does not match the expected shape' });
  }

  const entriesRaw = await readJsonDocument(entriesFilePath(root, config), dir);
  const entries = z.array(EntrySchema).safeParse(entriesRaw);
  if (!entries.success) {
    throw new IndexUnavailableError({ storeDir: dir, reason: 'index_corrupt', message: 'index.json does not match the expected shape' });
  }

  return new CodeIndex({ root, entries: entries.data, scannedAt: meta.data.scannedAt, version: meta.data.version });
}

/** Nearest directory at or above `startDir` that holds a store, or null. */
export async function findIndexRoot(startDir: string, config: IndexConfig = resolveIndexConfig()): Promise<string | null> {
  let dir = path.resolve(startDir);
  for (;;) {
    if (await fs.pathExists(metaFilePath(dir, config))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}
