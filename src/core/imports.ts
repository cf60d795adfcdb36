import path from 'path';
import { Logger } from './log';
import { LineCache } from './textFiles';
import { CodeIndex } from './codeIndex';

const JS_EXTENSIONS = ['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs'];
const IMPORTABLE = new Set(['.go', '.py', ...JS_EXTENSIONS]);

const GO_IMPORT_SINGLE = /^\s*import\s+(?:[\w.]+\s+)?"([^"]+)"/;
const GO_IMPORT_BLOCK = /^\s*import\s*\(/;
const GO_IMPORT_LINE = /^\s*(?:[\w.]+\s+)?"([^"]+)"/;
const GO_IMPORT_END = /^\s*\)/;

const JS_IMPORT_FROM = /(?:import|export)\s+.*?from\s+['"]([^'"]+)['"]/;
const JS_IMPORT_BARE = /^\s*import\s+['"]([^'"]+)['"]/;
const JS_REQUIRE = /require\s*\(\s*['"]([^'"]+)['"]\s*\)/;

const PY_FROM_IMPORT = /^\s*from\s+(\S+)\s+import\b/;
const PY_IMPORT = /^\s*import\s+([\w.]+)/;

export function isImportable(relPath: string): boolean {
  return IMPORTABLE.has(path.posix.extname(relPath));
}

/** Raw import specifiers written in a file, in source order. */
export function extractImportSpecifiers(relPath: string, lines: string[]): string[] {
  const ext = path.posix.extname(relPath);
  if (ext === '.go') return extractGoImports(lines);
  if (ext === '.py') return extractPythonImports(lines);
  if (JS_EXTENSIONS.includes(ext)) return extractJsImports(lines);
  return [];
}

function extractGoImports(lines: string[]): string[] {
  const out: string[] = [];
  let inBlock = false;
  for (const line of lines) {
    if (inBlock) {
      if (GO_IMPORT_END.test(line)) {
        inBlock = false;
        continue;
      }
      const m = GO_IMPORT_LINE.exec(line);
      if (m) out.push(m[1]);
      continue;
    }
    if (GO_IMPORT_BLOCK.test(line)) {
      inBlock = true;
      continue;
    }
    const m = GO_IMPORT_SINGLE.exec(line);
    if (m) out.push(m[1]);
  }
  return out;
}

function extractJsImports(lines: string[]): string[] {
  const out: string[] = [];
  for (const line of lines) {
    const from = JS_IMPORT_FROM.exec(line) ?? JS_IMPORT_BARE.exec(line);
    if (from) out.push(from[1]);
    const req = JS_REQUIRE.exec(line);
    if (req) out.push(req[1]);
  }
  return out;
}

function extractPythonImports(lines: string[]): string[] {
  const out: string[] = [];
  for (const line of lines) {
    const m = PY_FROM_IMPORT.exec(line) ?? PY_IMPORT.exec(line);
    if (m) out.push(m[1]);
  }
  return out;
}

/**
 * Maps import specifiers to indexed files. Specifiers that resolve to nothing
 * indexed (standard library, third-party packages) yield no targets.
 */
export class ImportResolver {
  private readonly files: ReadonlySet<string>;
  private readonly goFilesByDir = new Map<string, string[]>();

  constructor(filePaths: string[]) {
    this.files = new Set(filePaths);
    for (const p of filePaths) {
      if (!p.endsWith('.go') || p.endsWith('_test.go')) continue;
      const dir = path.posix.dirname(p);
      const list = this.goFilesByDir.get(dir) ?? [];
      list.push(p);
      this.goFilesByDir.set(dir, list);
    }
  }

  resolve(fromPath: string, spec: string): string[] {
    const ext = path.posix.extname(fromPath);
    const fromDir = path.posix.dirname(fromPath);
    if (ext === '.go') return this.resolveGo(spec);
    if (ext === '.py') return this.resolvePython(fromDir, spec);
    if (JS_EXTENSIONS.includes(ext)) return this.resolveJs(fromDir, spec);
    return [];
  }

  /**
   * Non-test files of every indexed directory equal to some suffix of the
   * import path. `example.com/app/util` reaches both `app/util` and `util`.
   */
  private resolveGo(spec: string): string[] {
    const parts = spec.split('/');
    const out: string[] = [];
    for (let i = 0; i < parts.length; i++) {
      const files = this.goFilesByDir.get(parts.slice(i).join('/'));
      if (files) out.push(...files);
    }
    return out;
  }

  private resolveJs(fromDir: string, spec: string): string[] {
    if (!spec.startsWith('.')) return [];
    const base = path.posix.normalize(path.posix.join(fromDir, spec));
    const candidates = [base];
    for (const e of JS_EXTENSIONS) candidates.push(base + e);
    for (const e of JS_EXTENSIONS) candidates.push(`${base}/index${e}`);
    const written = path.posix.extname(base);
    if (written === '.js' || written === '.jsx' || written === '.mjs' || written === '.cjs') {
      const stem = base.slice(0, -written.length);
      candidates.push(`${stem}.ts`, `${stem}.tsx`);
    }
    const hit = candidates.find((c) => this.files.has(c));
    return hit ? [hit] : [];
  }

  private resolvePython(fromDir: string, spec: string): string[] {
    const dots = /^\.*/.exec(spec)?.[0].length ?? 0;
    const parts = spec.slice(dots).split('.').filter(Boolean);
    const candidates: string[] = [];

    if (dots > 0) {
      let dir = fromDir;
      for (let i = 1; i < dots; i++) dir = path.posix.dirname(dir);
      const rel = path.posix.join(dir, ...parts);
      if (parts.length > 0) candidates.push(`${rel}.py`);
      candidates.push(path.posix.join(rel, '__init__.py'));
    } else if (parts.length > 0) {
      candidates.push(path.posix.join(fromDir, ...parts) + '.py');
      candidates.push(path.posix.join(...parts) + '.py');
      candidates.push(path.posix.join(...parts, '__init__.py'));
    }

    const hit = candidates.map((c) => path.posix.normalize(c)).find((c) => this.files.has(c));
    return hit ? [hit] : [];
  }
}

export type Adjacency = Map<string, string[]>;

/**
 * Forward adjacency: each importable file mapped to the sorted, distinct
 * indexed files it imports. Self-imports are dropped.
 */
export async function buildForwardAdjacency(
  index: CodeIndex,
  options: { lines?: LineCache; log?: Logger } = {}
): Promise<Adjacency> {
  const filePaths = index.filePaths();
  const resolver = new ImportResolver(filePaths);
  const lines = options.lines ?? new LineCache((p) => index.absolutePath(p), options.log);
  const forward: Adjacency = new Map();

  for (const from of filePaths) {
    if (!isImportable(from)) continue;
    const fileLines = await lines.get(from);
    if (!fileLines) continue;
    const targets = new Set<string>();
    for (const spec of extractImportSpecifiers(from, fileLines)) {
      for (const to of resolver.resolve(from, spec)) {
        if (to !== from) targets.add(to);
      }
    }
    if (targets.size > 0) forward.set(from, [...targets].sort());
  }
  return forward;
}

/** Importers of each file, derived from the forward relation. */
export function reverseAdjacency(forward: Adjacency): Adjacency {
  const reverse: Adjacency = new Map();
  for (const [from, targets] of forward) {
    for (const to of targets) {
      const list = reverse.get(to) ?? [];
      list.push(from);
      reverse.set(to, list);
    }
  }
  for (const list of reverse.values()) list.sort();
  return reverse;
}
