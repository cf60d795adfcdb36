import fs from 'fs-extra';
import { Logger } from './log';

const SNIFF_BYTES = 512;

/** A NUL byte in the first 512 bytes marks a file as binary. */
export function looksBinary(buf: Buffer): boolean {
  const end = Math.min(buf.length, SNIFF_BYTES);
  for (let i = 0; i < end; i++) {
    if (buf[i] === 0) return true;
  }
  return false;
}

/** File content as text, or null when the file is binary. Read errors propagate. */
export async function readTextFile(absPath: string): Promise<string | null> {
  const buf = await fs.readFile(absPath);
  if (looksBinary(buf)) return null;
  return buf.toString('utf-8');
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Memoises the lines of text files for the duration of one query. Unreadable
 * and binary files cache as null.
 */
export class LineCache {
  private readonly cache = new Map<string, string[] | null>();

  constructor(
    private readonly resolve: (relPath: string) => string,
    private readonly log?: Logger
  ) {}

  async get(relPath: string): Promise<string[] | null> {
    if (this.cache.has(relPath)) return this.cache.get(relPath) ?? null;
    let lines: string[] | null = null;
    try {
      const text = await readTextFile(this.resolve(relPath));
      lines = text === null ? null : splitLines(text);
    } catch (e) {
      this.log?.skip(relPath, 'unreadable', { err: e });
      lines = null;
    }
    this.cache.set(relPath, lines);
    return lines;
  }
}
