import { CodeIndex } from './codeIndex';
import { NotInIndexError } from './errors';
import { ExtractorRegistry } from './parser/registry';
import { readTextFile } from './textFiles';
import { SymbolInfo } from './types';

export interface OutlineItem extends SymbolInfo {
  members: SymbolInfo[];
}

export interface FileOutline {
  file: string;
  language: string | null;
  symbols: OutlineItem[];
}

/**
 * Top-level symbols of one indexed file in source order, with methods
 * attached to the type they belong to. A method whose parent is not declared
 * in the same file is listed at top level.
 */
export async function outlineFile(index: CodeIndex, file: string, registry: ExtractorRegistry): Promise<FileOutline> {
  if (!index.hasFile(file)) throw new NotInIndexError(file);
  const adapter = registry.adapterFor(file);
  if (!adapter) return { file, language: null, symbols: [] };

  const content = await readTextFile(index.absolutePath(file));
  const extracted = content === null ? [] : adapter.extract(file, content);

  const items: OutlineItem[] = [];
  const byName = new Map<string, OutlineItem>();
  for (const sym of extracted) {
    if (sym.parent === '') {
      const item: OutlineItem = { ...sym, members: [] };
      items.push(item);
      if (!byName.has(sym.name)) byName.set(sym.name, item);
    }
  }
  for (const sym of extracted) {
    if (sym.parent === '') continue;
    const owner = byName.get(sym.parent);
    if (owner) owner.members.push(sym);
    else items.push({ ...sym, members: [] });
  }
  items.sort((a, b) => a.line - b.line);

  return { file, language: adapter.getLanguageId(), symbols: items };
}

function describe(sym: SymbolInfo): string {
  const first = sym.signature.split('\n').pop() ?? sym.name;
  const span = sym.endLine > sym.line ? `${sym.line}-${sym.endLine}` : String(sym.line);
  return `${span.padEnd(9)} ${sym.kind.padEnd(9)} ${first}`;
}

export function formatOutline(o: FileOutline): string {
  if (o.language === null) return `${o.file}: no symbol extractor for this file type`;
  if (o.symbols.length === 0) return `${o.file} (${o.language}): no symbols`;
  const out = [`${o.file} (${o.language}):`];
  for (const item of o.symbols) {
    out.push(`  ${describe(item)}`);
    for (const m of item.members) out.push(`    ${describe(m)}`);
  }
  return out.join('\n');
}
