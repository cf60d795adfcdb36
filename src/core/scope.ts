import path from 'path';
import { CodeIndex } from './codeIndex';
import { buildForwardAdjacency, reverseAdjacency } from './imports';
import { Logger } from './log';
import { ExtractorRegistry, createDefaultRegistry } from './parser/registry';
import { compareStrings } from './paths';
import { fileSymbols } from './symbols';
import { LineCache } from './textFiles';
import { ScopeSummary, SymbolKind, VisibilityCounts } from './types';

export interface ScopeOptions {
  recursive?: boolean;
  registry?: ExtractorRegistry;
  log?: Logger;
}

function inScope(relPath: string, directory: string, recursive: boolean): boolean {
  if (!recursive) return path.posix.dirname(relPath) === directory;
  return directory === '.' || relPath.startsWith(`${directory}/`);
}

/**
 * What a directory holds and how it connects to the rest of the tree: its
 * files, line count, declarations by kind and visibility, and the outside
 * directories it imports from and is imported by.
 */
export async function summarizeScope(index: CodeIndex, dirArg: string, options: ScopeOptions = {}): Promise<ScopeSummary> {
  const registry = options.registry ?? createDefaultRegistry();
  const recursive = options.recursive ?? false;
  const directory = path.posix.normalize(dirArg.replace(/\/+$/, '') || '.');
  const lines = new LineCache((p) => index.absolutePath(p), options.log);

  const files = index.filePaths().filter((p) => inScope(p, directory, recursive)).sort(compareStrings);
  const members = new Set(files);

  let loc = 0;
  const symbols: Partial<Record<SymbolKind, VisibilityCounts>> = {};
  for (const relPath of files) {
    loc += (await lines.get(relPath))?.length ?? 0;
    for (const sym of await fileSymbols(relPath, lines, registry, options.log)) {
      const counts = symbols[sym.kind] ?? { exported: 0, internal: 0 };
      if (sym.exported) counts.exported++;
      else counts.internal++;
      symbols[sym.kind] = counts;
    }
  }

  const forward = await buildForwardAdjacency(index, { lines, log: options.log });
  const reverse = reverseAdjacency(forward);
  const dependencies = new Set<string>();
  const dependents = new Set<string>();
  for (const relPath of files) {
    for (const to of forward.get(relPath) ?? []) {
      if (!members.has(to)) dependencies.add(path.posix.dirname(to));
    }
    for (const from of reverse.get(relPath) ?? []) {
      if (!members.has(from)) dependents.add(path.posix.dirname(from));
    }
  }

  const prefix = directory === '.' ? '' : `${directory}/`;
  return {
    directory,
    recursive,
    files: files.map((p) => p.slice(prefix.length)),
    fileCount: files.length,
    loc,
    symbols,
    dependencies: [...dependencies].sort(compareStrings),
    dependents: [...dependents].sort(compareStrings),
  };
}

export function formatScope(s: ScopeSummary): string {
  if (s.fileCount === 0) return `No indexed files in ${s.directory}`;
  const out = [`Scope ${s.directory}${s.recursive ? ' (recursive)' : ''}: ${s.fileCount} files, ${s.loc} lines`];
  out.push('', 'Files:');
  for (const f of s.files) out.push(`  ${f}`);

  const kinds = Object.entries(s.symbols).sort(([a], [b]) => compareStrings(a, b));
  if (kinds.length > 0) {
    out.push('', 'Symbols:');
    for (const [kind, counts] of kinds) {
      if (counts) out.push(`  ${kind.padEnd(9)} ${counts.exported} exported, ${counts.internal} internal`);
    }
  }
  if (s.dependencies.length > 0) {
    out.push('', 'Depends on:');
    for (const d of s.dependencies) out.push(`  ${d}`);
  }
  if (s.dependents.length > 0) {
    out.push('', 'Used by:');
    for (const d of s.dependents) out.push(`  ${d}`);
  }
  return out.join('\n');
}
