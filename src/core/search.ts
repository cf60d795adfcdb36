import { CodeIndex } from './codeIndex';
import { QueryError } from './errors';
import { Logger } from './log';
import { LineCache } from './textFiles';
import { SearchMatch } from './types';

export function compilePattern(pattern: string): RegExp {
  if (!pattern.trim()) throw new QueryError('pattern must not be empty');
  try {
    return new RegExp(pattern);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new QueryError(`invalid pattern: ${msg}`);
  }
}

/** Lines matching `pattern` in indexed text files, in index order, at most `max`. */
export async function searchProject(
  index: CodeIndex,
  pattern: string,
  options: { max: number; log?: Logger }
): Promise<SearchMatch[]> {
  return searchLines(index, compilePattern(pattern), options);
}

/** Same as `searchProject` with an already compiled, non-global expression. */
export async function searchLines(
  index: CodeIndex,
  re: RegExp,
  options: { max: number; log?: Logger }
): Promise<SearchMatch[]> {
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const matches: SearchMatch[] = [];

  for (const relPath of index.filePaths()) {
    const fileLines = await lines.get(relPath);
    if (!fileLines) continue;
    for (let i = 0; i < fileLines.length; i++) {
      if (!re.test(fileLines[i])) continue;
      matches.push({ path: relPath, line: i + 1, content: fileLines[i].trim() });
      if (matches.length >= options.max) return matches;
    }
  }
  return matches;
}

export function formatSearch(pattern: string, matches: SearchMatch[]): string {
  if (matches.length === 0) return `No matches for /${pattern}/`;
  const lines = [`${matches.length} match(es) for /${pattern}/:`];
  for (const m of matches) lines.push(`  ${m.path}:${m.line}  ${m.content}`);
  return lines.join('\n');
}
