import Parser from 'tree-sitter';

export const findFirstByType = (n: Parser.SyntaxNode, types: string[]): Parser.SyntaxNode | null => {
  if (types.includes(n.type)) return n;
  for (let i = 0; i < n.childCount; i++) {
    const c = n.child(i);
    if (!c) continue;
    const found = findFirstByType(c, types);
    if (found) return found;
  }
  return null;
};

export const collapseWhitespace = (s: string): string => s.replace(/\s+/g, ' ').trim();

export const isUpperInitial = (name: string): boolean => /^\p{Lu}/u.test(name);

/** Everything before the first `{`, or the whole string when there is none. */
export const trimAtBrace = (s: string): string => {
  const idx = s.indexOf('{');
  return idx > 0 ? s.slice(0, idx).trim() : s;
};

export interface ScannedLine {
  /** The line with comment text blanked; string and template bodies are kept. */
  code: string;
  /** False when the line begins inside a block comment or a template literal. */
  startsInCode: boolean;
  /** Net `{[(` minus `)]}` counted outside strings, comments and `${}` bodies. */
  depthDelta: number;
  /** Whether any bracket was opened outside strings and comments. */
  opens: boolean;
}

/**
 * Line scanner for brace languages. Block comments and template literals may
 * span lines, so their state is carried from one `scan` call to the next.
 * Template frames alternate with interpolation frames on the stack; an
 * interpolation frame counts the braces opened inside its `${ }`.
 * Regex literals are not recognised.
 */
export class BraceScanner {
  private inBlockComment = false;
  private readonly stack: Array<'template' | number> = [];

  scan(line: string): ScannedLine {
    const startsInCode = !this.inBlockComment && this.stack.length === 0;
    let code = '';
    let depthDelta = 0;
    let opens = false;
    let quote: string | null = null;
    let i = 0;

    while (i < line.length) {
      const ch = line[i];
      const next = line[i + 1] ?? '';

      if (this.inBlockComment) {
        if (ch === '*' && next === '/') {
          this.inBlockComment = false;
          code += '  ';
          i += 2;
        } else {
          code += ' ';
          i++;
        }
        continue;
      }

      const top = this.stack[this.stack.length - 1];

      if (top === 'template') {
        if (ch === '\\') {
          code += ch + next;
          i += 2;
          continue;
        }
        if (ch === '`') {
          this.stack.pop();
        } else if (ch === '$' && next === '{') {
          this.stack.push(0);
          code += '${';
          i += 2;
          continue;
        }
        code += ch;
        i++;
        continue;
      }

      if (quote) {
        if (ch === '\\') {
          code += ch + next;
          i += 2;
          continue;
        }
        if (ch === quote) quote = null;
        code += ch;
        i++;
        continue;
      }

      if (ch === '/' && next === '/') break;
      if (ch === '/' && next === '*') {
        this.inBlockComment = true;
        code += '  ';
        i += 2;
        continue;
      }
      if (ch === '\'' || ch === '"') {
        quote = ch;
      } else if (ch === '`') {
        this.stack.push('template');
      } else if (typeof top === 'number') {
        if (ch === '{') {
          this.stack[this.stack.length - 1] = top + 1;
        } else if (ch === '}') {
          if (top === 0) this.stack.pop();
          else this.stack[this.stack.length - 1] = top - 1;
        }
      } else if (ch === '{' || ch === '[' || ch === '(') {
        depthDelta++;
        opens = true;
      } else if (ch === '}' || ch === ']' || ch === ')') {
        depthDelta--;
      }
      code += ch;
      i++;
    }

    return { code, startsInCode, depthDelta, opens };
  }
}

/**
 * 1-based last line of the bracketed construct starting at `start`: the line
 * where depth comes back to zero after something was opened. A start line
 * that opens nothing ends where it starts.
 */
export function findBracketBlockEnd(lines: ScannedLine[], start: number): number {
  if (!lines[start]?.opens) return start + 1;
  let depth = 0;
  for (let i = start; i < lines.length; i++) {
    depth += lines[i].depthDelta;
    if (depth <= 0) return i + 1;
  }
  return lines.length;
}
