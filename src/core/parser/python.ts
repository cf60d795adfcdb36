import { LanguageAdapter } from './adapter';
import { SymbolInfo } from '../types';

const DEF_RE = /^(?:async\s+)?def\s+(\w+)\s*\(/;
const CLASS_RE = /^class\s+(\w+)/;
const CONST_RE = /^([A-Z][A-Z0-9_]*)\s*[=:]/;
const DECORATOR_RE = /^@\S+/;

function indentOf(line: string): number {
  const m = /^\s*/.exec(line);
  return m ? m[0].length : 0;
}

/**
 * For each line, whether it starts inside a triple-quoted string. Such lines
 * neither declare anything nor close a block.
 */
export function tripleQuotedContinuations(lines: string[]): boolean[] {
  const flags: boolean[] = [];
  let open: string | null = null;

  for (const line of lines) {
    flags.push(open !== null);
    let i = 0;
    while (i < line.length) {
      if (open) {
        const end = line.indexOf(open, i);
        if (end < 0) break;
        open = null;
        i = end + 3;
        continue;
      }
      const ch = line[i];
      if (ch === '#') break;
      if (ch === '"' || ch === '\'') {
        const triple = ch.repeat(3);
        if (line.startsWith(triple, i)) {
          open = triple;
          i += 3;
          continue;
        }
        let j = i + 1;
        while (j < line.length && line[j] !== ch) j += line[j] === '\\' ? 2 : 1;
        i = j + 1;
        continue;
      }
      i++;
    }
  }

  return flags;
}

/** Python declarations by indentation. Nested functions are skipped. */
export class PythonAdapter implements LanguageAdapter {
  readonly variant = 'indent-heuristic' as const;

  getLanguageId(): string {
    return 'python';
  }

  getSupportedFileExtensions(): string[] {
    return ['.py'];
  }

  extract(_filePath: string, content: string): SymbolInfo[] {
    const lines = content.split(/\r?\n/);
    const inString = tripleQuotedContinuations(lines);
    const symbols: SymbolInfo[] = [];

    let currentClass: { name: string; bodyIndent: number | null } | null = null;
    let decorators: string[] = [];

    for (let i = 0; i < lines.length; i++) {
      if (inString[i]) continue;
      const trimmed = lines[i].trim();
      if (trimmed === '') {
        decorators = [];
        continue;
      }
      if (trimmed.startsWith('#')) continue;

      const indent = indentOf(lines[i]);
      if (currentClass && indent === 0) currentClass = null;
      if (currentClass && currentClass.bodyIndent === null) currentClass.bodyIndent = indent;

      if (DECORATOR_RE.test(trimmed)) {
        decorators.push(trimmed);
        continue;
      }

      const signature = [...decorators, trimmed].join('\n');
      decorators = [];

      const cls = indent === 0 ? CLASS_RE.exec(trimmed) : null;
      if (cls) {
        symbols.push(this.symbol(cls[1], 'class', i, this.blockEnd(lines, inString, i), signature, ''));
        currentClass = { name: cls[1], bodyIndent: null };
        continue;
      }

      const def = DEF_RE.exec(trimmed);
      if (def) {
        const endLine = this.blockEnd(lines, inString, i);
        if (indent === 0) {
          symbols.push(this.symbol(def[1], 'func', i, endLine, signature, ''));
        } else if (currentClass && indent === currentClass.bodyIndent) {
          symbols.push(this.symbol(def[1], 'method', i, endLine, signature, currentClass.name));
        }
        continue;
      }

      const constant = indent === 0 ? CONST_RE.exec(trimmed) : null;
      if (constant) {
        symbols.push({
          name: constant[1],
          kind: 'const',
          line: i + 1,
          endLine: i + 1,
          exported: true,
          signature: trimmed,
          parent: '',
        });
      }
    }

    return symbols;
  }

  private symbol(
    name: string,
    kind: 'class' | 'func' | 'method',
    index: number,
    endLine: number,
    signature: string,
    parent: string
  ): SymbolInfo {
    return { name, kind, line: index + 1, endLine, exported: !name.startsWith('_'), signature, parent };
  }

  /** 1-based last non-blank line before the next line indented at or left of the header. */
  private blockEnd(lines: string[], inString: boolean[], start: number): number {
    const base = indentOf(lines[start]);
    let last = start;
    for (let i = start + 1; i < lines.length; i++) {
      if (inString[i]) {
        last = i;
        continue;
      }
      const trimmed = lines[i].trim();
      if (trimmed === '' || trimmed.startsWith('#')) continue;
      if (indentOf(lines[i]) <= base) break;
      last = i;
    }
    return last + 1;
  }
}
