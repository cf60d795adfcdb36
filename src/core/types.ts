export type SymbolKind =
  | 'func'
  | 'method'
  | 'type'
  | 'struct'
  | 'class'
  | 'interface'
  | 'enum'
  | 'const'
  | 'var';

export type EntryKind = 'file' | SymbolKind;

/** One named declaration found by an extractor; discarded once folded into entries. */
export interface SymbolInfo {
  name: string;
  kind: SymbolKind;
  line: number;
  endLine: number;
  exported: boolean;
  signature: string;
  /** Enclosing type name; empty for top-level symbols. */
  parent: string;
}

export interface Entry {
  name: string;
  kind: EntryKind;
  path: string;
  /** 0 for file entries, >= 1 for symbols. */
  line: number;
  package: string;
  exported: boolean;
}

export interface IndexMeta {
  schemaVersion: number;
  root: string;
  scannedAt: string;
  version: string;
  fileCount: number;
  packageCount: number;
  extensions: Record<string, number>;
}

export interface ScoredEntry {
  entry: Entry;
  score: number;
}

export interface RefMatch {
  path: string;
  line: number;
  content: string;
  isDefinition: boolean;
}

export interface RefsResult {
  symbol: string;
  definition: RefMatch | null;
  references: RefMatch[];
}

export interface SearchMatch {
  path: string;
  line: number;
  content: string;
}

export interface GraphNode {
  path: string;
  fanIn: number;
  fanOut: number;
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface GraphStats {
  totalFiles: number;
  totalEdges: number;
  mostImported: GraphNode | null;
  mostDependent: GraphNode | null;
}

export interface ImportGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  stats: GraphStats;
}

export interface FocusedGraph extends ImportGraph {
  focus: string;
  depth: number;
}

export interface RelatedFiles {
  file: string;
  imports: string[];
  importedBy: string[];
  tests: string[];
}

export type ImpactMode = 'symbol' | 'file';

export interface ImpactSite {
  path: string;
  line: number;
  content: string;
  /** Innermost symbol whose span contains the site (symbol mode only). */
  enclosing?: { name: string; kind: SymbolKind; line: number };
}

export interface ImpactLayer {
  depth: number;
  label: string;
  sites: ImpactSite[];
}

export interface ImpactResult {
  target: string;
  mode: ImpactMode;
  targetKind: EntryKind | null;
  /** Where the target is defined (symbol mode) or the file itself (file mode). */
  location: { path: string; line: number } | null;
  layers: ImpactLayer[];
  summary: {
    totalFiles: number;
    totalRefSites: number;
    maxDepthReached: number;
  };
}

export interface DeadCodeCandidate {
  name: string;
  kind: SymbolKind;
  path: string;
  line: number;
  signature: string;
  parent: string;
}

export interface DeadCodeResult {
  candidates: DeadCodeCandidate[];
  totalCandidates: number;
  truncated: boolean;
}

export interface StaleReport {
  root: string;
  scannedAt: string;
  isStale: boolean;
  newFiles: string[];
  deletedFiles: string[];
  modifiedFiles: string[];
  summary: { new: number; deleted: number; modified: number };
}

export interface ExportedSymbol {
  name: string;
  kind: SymbolKind;
  path: string;
  line: number;
  signature: string;
  parent: string;
}

export interface ExportsResult {
  /** The file or directory asked about, without a trailing slash. */
  scope: string;
  symbols: ExportedSymbol[];
  count: number;
}

export interface SymbolMatch extends ExportedSymbol {
  exported: boolean;
}

export interface SymbolsResult {
  query: string;
  kind: string | null;
  matches: SymbolMatch[];
  /** Matches before truncation. */
  total: number;
}

export type TodoTag = 'TODO' | 'FIXME' | 'HACK' | 'XXX';

export interface TodoComment {
  path: string;
  line: number;
  tag: TodoTag;
  message: string;
  content: string;
}

export interface TodosResult {
  comments: TodoComment[];
  /** Comments passing the tag filter, before truncation. */
  total: number;
  /** Every marker found, whatever the filter. */
  byTag: Partial<Record<TodoTag, number>>;
}

export type EntryPointKind = 'main' | 'route' | 'cli' | 'init';

export interface EntryPoint {
  path: string;
  line: number;
  kind: EntryPointKind;
  signature: string;
}

export interface EntryPointsResult {
  entryPoints: EntryPoint[];
  total: number;
}

export interface SymbolContext {
  file: string;
  symbol: string;
  kind: SymbolKind;
  line: number;
  endLine: number;
  signature: string;
  parent: string;
  /** Import specifiers as written in the file. */
  imports: string[];
  docComment: string;
  body: string;
}

export interface VisibilityCounts {
  exported: number;
  internal: number;
}

export interface ScopeSummary {
  directory: string;
  recursive: boolean;
  /** Paths relative to `directory`. */
  files: string[];
  fileCount: number;
  loc: number;
  symbols: Partial<Record<SymbolKind, VisibilityCounts>>;
  /** Directories outside the scope that its files import. */
  dependencies: string[];
  /** Directories outside the scope whose files import it. */
  dependents: string[];
}

export type LocateMatchType = 'file' | 'symbol' | 'content';

export interface LocateMatch {
  type: LocateMatchType;
  path: string;
  /** 0 for file matches. */
  line: number;
  name: string;
  kind: EntryKind | null;
  content: string;
  score: number;
}

export interface LocateResult {
  query: string;
  matches: LocateMatch[];
  total: number;
}

export interface TestMapEntry {
  source: string;
  tests: string[];
}

export interface TestMapResult {
  entries: TestMapEntry[];
  summary: {
    sourceFiles: number;
    testedFiles: number;
    untestedFiles: number;
    /** Tested over source files, 0 when there are none. */
    coverageRatio: number;
  };
}

export interface FunctionComplexity {
  path: string;
  /** `Type.method` for methods. */
  name: string;
  line: number;
  endLine: number;
  complexity: number;
  lines: number;
  maxDepth: number;
  params: number;
  signature: string;
}

export interface ComplexityResult {
  functions: FunctionComplexity[];
  totalFunctions: number;
  avgComplexity: number;
  maxComplexity: number;
  highComplexityCount: number;
}
