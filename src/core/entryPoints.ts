import path from 'path';
import { CodeIndex } from './codeIndex';
import { isTestFile } from './deadCode';
import { QueryError } from './errors';
import { Logger } from './log';
import { compareStrings } from './paths';
import { LineCache } from './textFiles';
import { EntryPoint, EntryPointKind, EntryPointsResult } from './types';

export const ENTRY_POINT_KINDS: readonly EntryPointKind[] = ['main', 'route', 'cli', 'init'];

type PatternTable = ReadonlyArray<{ re: RegExp; kind: EntryPointKind }>;

const GO_PATTERNS: PatternTable = [
  { re: /^\s*func\s+main\s*\(/, kind: 'main' },
  { re: /^\s*func\s+init\s*\(/, kind: 'init' },
  { re: /\bhttp\.HandleFunc\s*\(/, kind: 'route' },
  { re: /\bhttp\.Handle\s*\(/, kind: 'route' },
  { re: /\bmux\.Handle/, kind: 'route' },
  { re: /\brouter\.HandleFunc\s*\(/, kind: 'route' },
  { re: /\b[re]\.(?:GET|POST|PUT|DELETE|PATCH)\s*\(/, kind: 'route' },
  { re: /\bapp\.(?:Get|Post|Put|Delete|Patch)\s*\(/, kind: 'route' },
  { re: /cobra\.Command\s*\{/, kind: 'cli' },
  { re: /\bAddCommand\s*\(/, kind: 'cli' },
  { re: /\bflag\.(?:String|Bool|Int|Float64|Duration)\s*\(/, kind: 'cli' },
];

const PYTHON_PATTERNS: PatternTable = [
  { re: /^\s*if\s+__name__\s*==/, kind: 'main' },
  { re: /@app\.(?:route|get|post|put|delete|patch)\s*\(/, kind: 'route' },
  { re: /@router\.(?:get|post|put|delete|patch)\s*\(/, kind: 'route' },
  { re: /\bpath\s*\(/, kind: 'route' },
  { re: /\.add_argument\s*\(/, kind: 'cli' },
  { re: /\.add_subparsers\s*\(/, kind: 'cli' },
  { re: /@click\.(?:command|group)/, kind: 'cli' },
  { re: /\bFlask\s*\(/, kind: 'init' },
  { re: /\bFastAPI\s*\(/, kind: 'init' },
  { re: /\bdef\s+setup\s*\(/, kind: 'init' },
];

const JS_PATTERNS: PatternTable = [
  { re: /\bcreateServer\s*\(/, kind: 'main' },
  { re: /\.listen\s*\(/, kind: 'main' },
  { re: /\bserve\s*\(/, kind: 'main' },
  { re: /\b(?:app|router)\.(?:get|post|put|delete|patch|use)\s*\(/, kind: 'route' },
  { re: /\.command\s*\(/, kind: 'cli' },
  { re: /\bcreateApp\s*\(/, kind: 'init' },
  { re: /\bcreateRoot\s*\(/, kind: 'init' },
  { re: /\bReactDOM\.render\s*\(/, kind: 'init' },
];

const PATTERNS_BY_EXTENSION: Record<string, PatternTable> = {
  '.go': GO_PATTERNS,
  '.py': PYTHON_PATTERNS,
  '.js': JS_PATTERNS,
  '.jsx': JS_PATTERNS,
  '.ts': JS_PATTERNS,
  '.tsx': JS_PATTERNS,
  '.mjs': JS_PATTERNS,
  '.cjs': JS_PATTERNS,
};

const HEADERS: Record<EntryPointKind, string> = {
  main: 'Main entry points',
  route: 'Route handlers',
  cli: 'CLI commands',
  init: 'Init functions',
};

function isEntryPointKind(s: string): s is EntryPointKind {
  return ENTRY_POINT_KINDS.some((k) => k === s);
}

export function parseEntryPointKind(raw: string): EntryPointKind {
  const kind = raw.trim().toLowerCase();
  if (!isEntryPointKind(kind)) throw new QueryError(`unknown entry point kind ${raw}; expected one of ${ENTRY_POINT_KINDS.join(', ')}`);
  return kind;
}

export interface EntryPointsOptions {
  kind?: string;
  max: number;
  log?: Logger;
}

/**
 * Lines that start a program, register a route or a command, or bootstrap an
 * application. Each line is classified by the first pattern it matches; test
 * files are skipped. Sorted by kind, then path, then line.
 */
export async function findEntryPoints(index: CodeIndex, options: EntryPointsOptions): Promise<EntryPointsResult> {
  const only = options.kind ? parseEntryPointKind(options.kind) : null;
  const lines = new LineCache((p) => index.absolutePath(p), options.log);
  const found: EntryPoint[] = [];

  for (const relPath of index.filePaths()) {
    if (isTestFile(relPath)) continue;
    const patterns = PATTERNS_BY_EXTENSION[path.posix.extname(relPath).toLowerCase()];
    if (!patterns) continue;
    const fileLines = await lines.get(relPath);
    if (!fileLines) continue;
    for (let i = 0; i < fileLines.length; i++) {
      const hit = patterns.find((p) => p.re.test(fileLines[i]));
      if (!hit) continue;
      if (only && hit.kind !== only) continue;
      found.push({ path: relPath, line: i + 1, kind: hit.kind, signature: fileLines[i].trim() });
    }
  }

  const order = (k: EntryPointKind) => ENTRY_POINT_KINDS.indexOf(k);
  found.sort((a, b) => order(a.kind) - order(b.kind) || compareStrings(a.path, b.path) || a.line - b.line);
  return { entryPoints: found.slice(0, options.max), total: found.length };
}

export function formatEntryPoints(r: EntryPointsResult): string {
  if (r.entryPoints.length === 0) return 'No entry points found';
  const out: string[] = [];
  for (const kind of ENTRY_POINT_KINDS) {
    const group = r.entryPoints.filter((e) => e.kind === kind);
    if (group.length === 0) continue;
    if (out.length > 0) out.push('');
    out.push(`${HEADERS[kind]}:`);
    for (const e of group) out.push(`  ${`${e.path}:${e.line}`.padEnd(30)} ${e.signature}`);
  }
  out.push('', `${r.total} entry points found`);
  return out.join('\n');
}
