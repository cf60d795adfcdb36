export { CodeIndex, INDEX_SCHEMA_VERSION } from './core/codeIndex';
export { scanProject, persistIndex, loadIndex, findIndexRoot } from './core/store';
export type { ScanOptions, ScanProgress } from './core/store';
export { rankEntries, filterExact, boundedEditDistance, MATCH_SCORES } from './core/match';
export { findReferences } from './core/refs';
export { searchProject } from './core/search';
export { buildImportGraph, buildFocusedGraph, findRelatedFiles } from './core/graph';
export { analyzeImpact, classifyImpactTarget } from './core/impact';
export { findDeadCode } from './core/deadCode';
export { checkStaleness } from './core/stale';
export { findSymbols } from './core/symbols';
export { listExports } from './core/exports';
export { symbolContext } from './core/context';
export { locate, LOCATE_SCORES } from './core/locate';
export { summarizeScope } from './core/scope';
export { findTodos, TODO_TAGS } from './core/todos';
export { findEntryPoints, ENTRY_POINT_KINDS } from './core/entryPoints';
export { mapTests } from './core/testMap';
export type { TestMapFilter } from './core/testMap';
export { analyzeComplexity } from './core/complexity';
export { checkIndex } from './core/indexCheck';
export { outlineFile } from './core/outline';
export { ExtractorRegistry, createDefaultRegistry } from './core/parser/registry';
export type { LanguageAdapter, ExtractorVariant } from './core/parser/adapter';
export { resolveIndexConfig, defaultQueryDefaults } from './core/config';
export type { IndexConfig, QueryDefaults } from './core/config';
export { createLogger } from './core/log';
export type { FileSkipReason, LogComponent, LogFields, Logger, LogLevel } from './core/log';
export * from './core/errors';
export type * from './core/types';
