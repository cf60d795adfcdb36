import { CodeIndex } from './codeIndex';
import { QueryError } from './errors';
import { Logger } from './log';
import { LineCache } from './textFiles';
import { RefMatch, RefsResult } from './types';

const IDENT_CHARS = 'A-Za-z0-9_$';

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** `name` as a whole identifier: no identifier character on either side. */
export function wordPattern(name: string): RegExp {
  return new RegExp(`(?<![${IDENT_CHARS}])${escapeRegExp(name)}(?![${IDENT_CHARS}])`);
}

const DEFINITION_TEMPLATES = [
  'func\\s+%s\\b',
  'func\\s+\\([^)]+\\)\\s+%s\\b',
  'type\\s+%s\\b',
  'var\\s+%s\\b',
  'const\\s+%s\\b',
  'class\\s+%s\\b',
  'def\\s+%s\\b',
  'let\\s+%s\\b',
  'function\\s+%s\\b',
  'interface\\s+%s\\b',
  'struct\\s+%s\\b',
  'enum\\s+%s\\b',
];

/**
 * Declaration-looking lines for `name` across the supported languages. This
 * is textual: a string literal such as "type Foo" also matches.
 */
export function definitionPatterns(name: string): RegExp[] {
  const escaped = escapeRegExp(name);
  return DEFINITION_TEMPLATES.map((t) => new RegExp(t.replace('%s', escaped)));
}

export interface RefsOptions {
  max: number;
  lines?: LineCache;
  log?: Logger;
}

/**
 * Definition and usage sites of `symbol` across every indexed text file.
 * A symbol entry in the index is the authoritative definition; without one,
 * the first declaration-looking line is. Other declaration-looking lines stay
 * in the reference list flagged `isDefinition`.
 */
export async function findReferences(index: CodeIndex, symbol: string, options: RefsOptions): Promise<RefsResult> {
  const name = symbol.trim();
  if (!name) throw new QueryError('symbol must not be empty');

  const word = wordPattern(name);
  const defPatterns = definitionPatterns(name);
  const lines = options.lines ?? new LineCache((p) => index.absolutePath(p), options.log);
  const authoritative = index.definitionOf(name);

  let definition: RefMatch | null = null;
  const references: RefMatch[] = [];

  outer: for (const relPath of index.filePaths()) {
    if (references.length >= options.max) break;
    const fileLines = await lines.get(relPath);
    if (!fileLines) continue;

    for (let i = 0; i < fileLines.length; i++) {
      const text = fileLines[i];
      if (!word.test(text)) continue;
      const lineNo = i + 1;
      const match: RefMatch = { path: relPath, line: lineNo, content: text.trim(), isDefinition: false };

      if (authoritative && authoritative.path === relPath && authoritative.line === lineNo) {
        definition = { ...match, isDefinition: true };
        continue;
      }

      const looksLikeDefinition = defPatterns.some((re) => re.test(text));
      if (looksLikeDefinition && !authoritative && !definition) {
        definition = { ...match, isDefinition: true };
        continue;
      }

      references.push({ ...match, isDefinition: looksLikeDefinition });
      if (references.length >= options.max) break outer;
    }
  }

  if (authoritative && !definition) {
    const fileLines = await lines.get(authoritative.path);
    const text = fileLines?.[authoritative.line - 1] ?? '';
    definition = { path: authoritative.path, line: authoritative.line, content: text.trim(), isDefinition: true };
  }

  return { symbol: name, definition, references };
}

export function formatRefs(r: RefsResult): string {
  const out: string[] = [];
  if (r.definition) {
    out.push(`Definition: ${r.definition.path}:${r.definition.line}`);
    if (r.definition.content) out.push(`  ${r.definition.content}`);
  } else {
    out.push(`Definition: not found`);
  }
  out.push('');
  if (r.references.length === 0) {
    out.push(`No references to ${r.symbol}`);
    return out.join('\n');
  }
  out.push(`References (${r.references.length}):`);
  for (const m of r.references) {
    out.push(`  ${m.path}:${m.line}${m.isDefinition ? ' [def]' : ''}  ${m.content}`);
  }
  return out.join('\n');
}
