import { LanguageAdapter } from './adapter';
import { SymbolInfo, SymbolKind } from '../types';
import { BraceScanner, ScannedLine, findBracketBlockEnd, trimAtBrace } from './utils';

interface TopLevelPattern {
  re: RegExp;
  kind: SymbolKind;
  trimBody: boolean;
}

// Group 1 marks `default`, group 2 is the name. Order matters: `const enum`
// must be tried before the variable pattern.
const TOP_LEVEL: TopLevelPattern[] = [
  { re: /^(?:export\s+)?(default\s+)?(?:async\s+)?function\b\s*\*?\s*([\w$]+)?/, kind: 'func', trimBody: false },
  { re: /^(?:export\s+)?(default\s+)?(?:abstract\s+)?class\b(?:\s+(?!(?:extends|implements)\b)([\w$]+))?/, kind: 'class', trimBody: true },
  { re: /^(?:export\s+)?(?:declare\s+)?interface\s+()([\w$]+)/, kind: 'interface', trimBody: true },
  { re: /^(?:export\s+)?(?:declare\s+)?(?:const\s+)?enum\s+()([\w$]+)/, kind: 'enum', trimBody: true },
  { re: /^(?:export\s+)?(?:declare\s+)?type\s+()([\w$]+)\b/, kind: 'type', trimBody: false },
  { re: /^(?:export\s+)?(?:declare\s+)?(?:const|let|var)\s+()([\w$]+)/, kind: 'const', trimBody: false },
];

const METHOD_RE =
  /^(?:(?:public|private|protected|static|readonly|abstract|override|async|get|set)\s+)*\*?\s*(#?[\w$]+)\s*[<(]/;

const NOT_METHODS = new Set([
  'if', 'else', 'for', 'while', 'do', 'switch', 'case', 'break',
  'continue', 'return', 'throw', 'try', 'catch', 'finally',
  'new', 'delete', 'typeof', 'instanceof', 'void', 'in', 'of',
  'class', 'extends', 'super', 'import', 'export', 'default',
  'function', 'const', 'let', 'var', 'this', 'true', 'false', 'null',
]);

function isImportLine(trimmed: string): boolean {
  return /^import[\s{*]/.test(trimmed) || trimmed.startsWith('require(');
}

/**
 * JavaScript and TypeScript declarations by line scanning. Nesting is
 * tracked by bracket depth, so only depth-0 lines can declare top-level
 * symbols and only depth-1 lines inside a class body can declare methods.
 */
export class JavaScriptAdapter implements LanguageAdapter {
  readonly variant = 'brace-heuristic' as const;

  getLanguageId(): string {
    return 'javascript';
  }

  getSupportedFileExtensions(): string[] {
    return ['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs'];
  }

  extract(_filePath: string, content: string): SymbolInfo[] {
    const scanner = new BraceScanner();
    const lines: ScannedLine[] = content.split(/\r?\n/).map((l) => scanner.scan(l));
    const symbols: SymbolInfo[] = [];

    let depth = 0;
    let currentClass: { name: string; endLine: number } | null = null;

    for (let i = 0; i < lines.length; i++) {
      const scanned = lines[i];
      const before = depth;
      depth += scanned.depthDelta;

      if (currentClass && i + 1 > currentClass.endLine) currentClass = null;

      const trimmed = scanned.code.trim();
      if (!scanned.startsInCode || trimmed === '') continue;
      if (trimmed.startsWith('@') || isImportLine(trimmed)) continue;

      if (before === 0) {
        const sym = this.matchTopLevel(trimmed, i + 1);
        if (!sym) continue;
        sym.endLine = findBracketBlockEnd(lines, i);
        symbols.push(sym);
        currentClass = sym.kind === 'class' ? { name: sym.name, endLine: sym.endLine } : null;
      } else if (before === 1 && currentClass) {
        const sym = this.matchMethod(trimmed, i + 1, currentClass.name);
        if (!sym) continue;
        sym.endLine = findBracketBlockEnd(lines, i);
        symbols.push(sym);
      }
    }

    return symbols;
  }

  private matchTopLevel(trimmed: string, line: number): SymbolInfo | null {
    for (const p of TOP_LEVEL) {
      const m = p.re.exec(trimmed);
      if (!m) continue;
      // Anonymous default exports are recorded under the name `default`.
      const name = m[2] ?? (m[1] ? 'default' : undefined);
      if (!name) return null;
      return {
        name,
        kind: p.kind,
        line,
        endLine: line,
        exported: trimmed.startsWith('export '),
        signature: p.trimBody ? trimAtBrace(trimmed) : trimmed,
        parent: '',
      };
    }
    return null;
  }

  private matchMethod(trimmed: string, line: number, className: string): SymbolInfo | null {
    const m = METHOD_RE.exec(trimmed);
    if (!m) return null;
    const name = m[1];
    if (NOT_METHODS.has(name)) return null;
    const exported = !name.startsWith('_') && !name.startsWith('#') && !trimmed.startsWith('private ');
    return {
      name,
      kind: 'method',
      line,
      endLine: line,
      exported,
      signature: trimmed,
      parent: className,
    };
  }
}
