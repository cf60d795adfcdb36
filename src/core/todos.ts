import { CodeIndex } from './codeIndex';
import { QueryError } from './errors';
import { Logger } from './log';
import { LineCache } from './textFiles';
import { TodoComment, TodoTag, TodosResult } from './types';

export const TODO_TAGS: readonly TodoTag[] = ['TODO', 'FIXME', 'HACK', 'XXX'];

const MARKER_RE = /\b(TODO|FIXME|HACK|XXX)\b[:\s]*(.*)/i;

function isTodoTag(s: string): s is TodoTag {
  return TODO_TAGS.some((t) => t === s);
}

/** Upper-cased tag, or a QueryError naming the accepted ones. */
export function parseTodoTag(raw: string): TodoTag {
  const tag = raw.trim().toUpperCase();
  if (!isTodoTag(tag)) throw new QueryError(`unknown tag ${raw}; expected one of ${TODO_TAGS.join(', ')}`);
  return tag;
}

export interface TodosOptions {
  tag?: string;
  max: number;
  log?: Logger;
}

/**
 * Marker comments in indexed text files, sorted by path. `byTag` counts every
 * marker; the tag filter and `max` apply to the returned list only.
 */
export async function findTodos(index: CodeIndex, options: TodosOptions): Promise<TodosResult> {
  const only = options.tag ? parseTodoTag(options.tag) : null;
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const byTag: Partial<Record<TodoTag, number>> = {};
  const comments: TodoComment[] = [];

  for (const relPath of index.filePaths().sort()) {
    const fileLines = await lines.get(relPath);
    if (!fileLines) continue;
    for (let i = 0; i < fileLines.length; i++) {
      const m = MARKER_RE.exec(fileLines[i]);
      if (!m) continue;
      const tag = m[1].toUpperCase();
      if (!isTodoTag(tag)) continue;
      byTag[tag] = (byTag[tag] ?? 0) + 1;
      if (only && tag !== only) continue;
      comments.push({ path: relPath, line: i + 1, tag, message: m[2].trim(), content: fileLines[i].trim() });
    }
  }

  return { comments: comments.slice(0, options.max), total: comments.length, byTag };
}

export function formatTodos(r: TodosResult): string {
  if (r.comments.length === 0) return 'No TODO comments found';
  const out = [`${r.total} comments:`];
  for (const c of r.comments) out.push(`  ${`${c.path}:${c.line}`.padEnd(30)} [${c.tag}] ${c.message}`);
  if (r.total > r.comments.length) out.push(`(showing ${r.comments.length} of ${r.total})`);
  const counts = TODO_TAGS.filter((t) => r.byTag[t]).map((t) => `${t}=${r.byTag[t]}`);
  out.push('', `By tag: ${counts.join(', ')}`);
  return out.join('\n');
}
