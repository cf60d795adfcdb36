import path from 'path';
import { Entry, IndexMeta, ScoredEntry } from './types';
import { filterExact, rankEntries } from './match';
import { NO_EXTENSION, extensionOf } from './paths';

export const INDEX_SCHEMA_VERSION = 1;

/**
 * The loaded entry store. Entries are never mutated; a new scan produces a
 * new index.
 */
export class CodeIndex {
  readonly root: string;
  readonly entries: readonly Entry[];
  readonly scannedAt: string;
  readonly version: string;
  private readonly fileSet: ReadonlySet<string>;

  constructor(args: { root: string; entries: readonly Entry[]; scannedAt: string; version: string }) {
    this.root = args.root;
    this.entries = args.entries;
    this.scannedAt = args.scannedAt;
    this.version = args.version;
    this.fileSet = new Set(this.entries.filter((e) => e.kind === 'file').map((e) => e.path));
  }

  /** Distinct file paths in index order. */
  filePaths(): string[] {
    return [...this.fileSet];
  }

  symbols(): Entry[] {
    return this.entries.filter((e) => e.kind !== 'file');
  }

  hasFile(relPath: string): boolean {
    return this.fileSet.has(relPath);
  }

  absolutePath(relPath: string): string {
    return path.join(this.root, relPath);
  }

  get fileCount(): number {
    return this.fileSet.size;
  }

  get packageCount(): number {
    return new Set(this.entries.map((e) => e.package).filter(Boolean)).size;
  }

  extensionCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const p of this.fileSet) {
      const ext = extensionOf(p) || NO_EXTENSION;
      counts[ext] = (counts[ext] ?? 0) + 1;
    }
    return counts;
  }

  /** The first symbol entry named exactly `name`. */
  definitionOf(name: string): Entry | null {
    return this.entries.find((e) => e.kind !== 'file' && e.line > 0 && e.name === name) ?? null;
  }

  match(query: string): Entry[] {
    return rankEntries(this.entries, query).map((s) => s.entry);
  }

  matchScored(query: string): ScoredEntry[] {
    return rankEntries(this.entries, query);
  }

  matchExact(query: string): Entry[] {
    return filterExact(this.entries, query);
  }

  meta(): IndexMeta {
    return {
      schemaVersion: INDEX_SCHEMA_VERSION,
      root: this.root,
      scannedAt: this.scannedAt,
      version: this.version,
      fileCount: this.fileCount,
      packageCount: this.packageCount,
      extensions: this.extensionCounts(),
    };
  }
}
