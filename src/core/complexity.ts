import Parser from 'tree-sitter';
import { CodeIndex } from './codeIndex';
import { NotInIndexError } from './errors';
import { Logger } from './log';
import { GoAdapter } from './parser/go';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { compareStrings } from './paths';
import { signatureHead } from './symbols';
import { LineCache } from './textFiles';
import { ComplexityResult, FunctionComplexity, SymbolInfo } from './types';

const GO_NESTING = new Set([
  'if_statement',
  'for_statement',
  'expression_switch_statement',
  'type_switch_statement',
  'select_statement',
]);
const GO_CASES = new Set(['expression_case', 'type_case', 'default_case', 'communication_case']);

const PYTHON_BRANCHES = [/\bif\b/, /\belif\b/, /\bfor\b/, /\bwhile\b/, /\bexcept\b/, /\band\b/, /\bor\b/];
const JS_BRANCHES = [
  /\bif\s*\(/,
  /\belse\s+if\s*\(/,
  /\bfor\s*\(/,
  /\bwhile\s*\(/,
  /\bcase\b/,
  /\bcatch\s*\(/,
  /&&/,
  /\|\|/,
  /\?\s/,
];

export interface ComplexityOptions {
  /** Restrict the report to one indexed file. */
  file?: string;
  /** 0 or undefined keeps every function. */
  max?: number;
  minComplexity?: number;
  highThreshold?: number;
  registry?: ExtractorRegistry;
  log?: Logger;
}

interface Measured {
  branches: number;
  maxDepth: number;
}

/** Branch points and deepest nesting of if/for/switch/select inside a Go function body. */
function measureGoBody(body: Parser.SyntaxNode): Measured {
  let branches = 0;
  let maxDepth = 0;
  const visit = (n: Parser.SyntaxNode, depth: number): void => {
    let d = depth;
    if (GO_NESTING.has(n.type)) {
      branches++;
      d++;
      if (d > maxDepth) maxDepth = d;
    } else if (GO_CASES.has(n.type)) {
      branches++;
    } else if (n.type === 'binary_expression') {
      const op = n.childForFieldName('operator')?.type;
      if (op === '&&' || op === '||') branches++;
    }
    for (const c of n.namedChildren) visit(c, d);
  };
  visit(body, 0);
  return { branches, maxDepth };
}

/** Declared parameter names; an unnamed parameter counts once. */
function countGoParams(fn: Parser.SyntaxNode): number {
  const list = fn.childForFieldName('parameters');
  if (!list) return 0;
  let count = 0;
  for (const decl of list.namedChildren) {
    if (decl.type !== 'parameter_declaration' && decl.type !== 'variadic_parameter_declaration') continue;
    const names = decl.namedChildren.filter((c) => c.type === 'identifier').length;
    count += Math.max(names, 1);
  }
  return count;
}

function goFunctions(relPath: string, content: string, adapter: GoAdapter): FunctionComplexity[] {
  const out: FunctionComplexity[] = [];
  for (const n of adapter.parseTree(content).rootNode.namedChildren) {
    if (n.type !== 'function_declaration' && n.type !== 'method_declaration') continue;
    const body = n.childForFieldName('body');
    const sym = adapter.functionSymbol(n);
    if (!body || !sym) continue;
    const { branches, maxDepth } = measureGoBody(body);
    out.push({
      path: relPath,
      name: sym.parent ? `${sym.parent}.${sym.name}` : sym.name,
      line: sym.line,
      endLine: sym.endLine,
      complexity: 1 + branches,
      lines: sym.endLine - sym.line + 1,
      maxDepth,
      params: countGoParams(n),
      signature: sym.signature,
    });
  }
  return out;
}

const CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}', '<': '>' };

/** Top-level parameters in the first parenthesised list; `self`, `cls` and bare `*` or `/` are not counted. */
export function countSignatureParams(signature: string): number {
  const head = signatureHead(signature);
  const open = head.indexOf('(');
  if (open < 0) return 0;

  const parts: string[] = [];
  const stack: string[] = [];
  let current = '';
  for (let i = open + 1; i < head.length; i++) {
    const ch = head[i];
    if (stack.length === 0 && ch === ')') break;
    if (ch in CLOSERS) stack.push(CLOSERS[ch]);
    else if (stack.length > 0 && ch === stack[stack.length - 1] && !(ch === '>' && head[i - 1] === '=')) stack.pop();
    if (stack.length === 0 && ch === ',') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts
    .map((p) => p.trim().split(/[:=\s]/)[0])
    .filter((name) => name !== '' && name !== 'self' && name !== 'cls' && name !== '*' && name !== '/').length;
}

function indentWidth(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width++;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
}

function isCommentOrBlank(trimmed: string, python: boolean): boolean {
  if (trimmed === '') return true;
  if (python) return trimmed.startsWith('#');
  return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
}

/**
 * Line-pattern estimate for the heuristic extractors: one point per branch
 * pattern a line matches. Nesting is read from indentation (4 columns a
 * level) for Python and from brace depth otherwise, not counting the
 * function body's own level.
 */
function heuristicFunction(relPath: string, sym: SymbolInfo, lines: string[], python: boolean): FunctionComplexity {
  const patterns = python ? PYTHON_BRANCHES : JS_BRANCHES;
  const end = Math.min(Math.max(sym.endLine, sym.line), lines.length);
  const baseIndent = indentWidth(lines[sym.line - 1] ?? '');
  let branches = 0;
  let deepest = 0;
  let braces = 0;

  for (let li = sym.line; li <= end; li++) {
    const line = lines[li - 1];
    const trimmed = line.trim();
    if (isCommentOrBlank(trimmed, python)) continue;
    for (const re of patterns) {
      if (re.test(trimmed)) branches++;
    }
    if (python) {
      const indent = indentWidth(line);
      if (indent > baseIndent) deepest = Math.max(deepest, Math.floor((indent - baseIndent) / 4));
    } else {
      for (const ch of line) {
        if (ch === '{') deepest = Math.max(deepest, ++braces);
        else if (ch === '}') braces--;
      }
    }
  }

  return {
    path: relPath,
    name: sym.parent ? `${sym.parent}.${sym.name}` : sym.name,
    line: sym.line,
    endLine: end,
    complexity: 1 + branches,
    lines: end - sym.line + 1,
    maxDepth: Math.max(deepest - 1, 0),
    params: countSignatureParams(sym.signature),
    signature: sym.signature,
  };
}

async function analyzeFile(
  relPath: string,
  lines: LineCache,
  registry: ExtractorRegistry,
  log?: Logger
): Promise<FunctionComplexity[]> {
  const adapter = registry.adapterFor(relPath);
  if (!adapter) return [];
  const fileLines = await lines.get(relPath);
  if (!fileLines) return [];
  const content = fileLines.join('\n');
  try {
    if (adapter instanceof GoAdapter) return goFunctions(relPath, content, adapter);
    const python = adapter.variant === 'indent-heuristic';
    return adapter
      .extract(relPath, content)
      .filter((s) => s.kind === 'func' || s.kind === 'method')
      .map((s) => heuristicFunction(relPath, s, fileLines, python));
  } catch (e) {
    log?.skip(relPath, 'extract_failed', { err: e });
    return [];
  }
}

/**
 * Cyclomatic complexity per function: 1 plus one per branch point. Go is
 * measured on its syntax tree; the other languages by line patterns. The
 * summary covers every function measured, before `minComplexity` and `max`.
 */
export async function analyzeComplexity(index: CodeIndex, options: ComplexityOptions = {}): Promise<ComplexityResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const high = options.highThreshold ?? 10;

  if (options.file !== undefined && !index.hasFile(options.file)) throw new NotInIndexError(options.file);
  const files = options.file !== undefined ? [options.file] : index.filePaths();

  const all: FunctionComplexity[] = [];
  for (const relPath of files) all.push(...(await analyzeFile(relPath, lines, registry, options.log)));
  all.sort((a, b) => b.complexity - a.complexity || compareStrings(a.path, b.path) || a.line - b.line);

  const total = all.reduce((sum, f) => sum + f.complexity, 0);
  const kept = all.filter((f) => f.complexity >= (options.minComplexity ?? 0));
  const max = options.max && options.max > 0 ? options.max : kept.length;

  return {
    functions: kept.slice(0, max),
    totalFunctions: all.length,
    avgComplexity: all.length === 0 ? 0 : total / all.length,
    maxComplexity: all.reduce((m, f) => Math.max(m, f.complexity), 0),
    highComplexityCount: all.filter((f) => f.complexity >= high).length,
  };
}

export function formatComplexity(r: ComplexityResult): string {
  if (r.totalFunctions === 0) return 'No functions found';
  const out = [
    `${r.totalFunctions} functions, average complexity ${r.avgComplexity.toFixed(1)}, max ${r.maxComplexity}, ${r.highComplexityCount} high`,
  ];
  if (r.functions.length === 0) return out.join('\n');
  out.push('');
  for (const f of r.functions) {
    const where = `${f.path}:${f.line}`;
    out.push(`  ${String(f.complexity).padStart(4)}  ${where.padEnd(30)} ${f.name} (lines ${f.lines}, depth ${f.maxDepth}, params ${f.params})`);
  }
  return out.join('\n');
}
