import type { HandlerRegistration } from './types';
import { defineHandler } from './types';
import { ScanSchema } from './schemas/indexSchemas';
import { handleScan } from './handlers/indexHandlers';
import { StaleSchema, StatusSchema } from './schemas/statusSchemas';
import { handleStale, handleStatus } from './handlers/statusHandlers';
import {
  ContextSchema,
  ExportsSchema,
  LocateSchema,
  LookupSchema,
  OutlineSchema,
  RefsSchema,
  SearchSchema,
  SymbolsSchema,
} from './schemas/querySchemas';
import {
  handleContext,
  handleExports,
  handleLocate,
  handleLookup,
  handleOutline,
  handleRefs,
  handleSearch,
  handleSymbols,
} from './handlers/queryHandlers';
import { GraphSchema, RelatedSchema, ScopeSchema } from './schemas/graphSchemas';
import { handleGraph, handleRelated, handleScope } from './handlers/graphHandlers';
import {
  ComplexitySchema,
  DeadCodeSchema,
  EntryPointsSchema,
  ImpactSchema,
  TestMapSchema,
  TodosSchema,
} from './schemas/analysisSchemas';
import {
  handleComplexity,
  handleDeadCode,
  handleEntryPoints,
  handleImpact,
  handleTestMap,
  handleTodos,
} from './handlers/analysisHandlers';

/**
 * Registry of all CLI command handlers.
 *
 * Command keys match the subcommand names given to commander.
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  // Index lifecycle
  'scan': defineHandler(ScanSchema, handleScan),
  'status': defineHandler(StatusSchema, handleStatus),
  'stale': defineHandler(StaleSchema, handleStale),
  // Queries
  'lookup': defineHandler(LookupSchema, handleLookup),
  'search': defineHandler(SearchSchema, handleSearch),
  'refs': defineHandler(RefsSchema, handleRefs),
  'outline': defineHandler(OutlineSchema, handleOutline),
  'symbols': defineHandler(SymbolsSchema, handleSymbols),
  'exports': defineHandler(ExportsSchema, handleExports),
  'context': defineHandler(ContextSchema, handleContext),
  'locate': defineHandler(LocateSchema, handleLocate),
  // Import graph
  'related': defineHandler(RelatedSchema, handleRelated),
  'graph': defineHandler(GraphSchema, handleGraph),
  'scope': defineHandler(ScopeSchema, handleScope),
  // Analysis
  'impact': defineHandler(ImpactSchema, handleImpact),
  'dead-code': defineHandler(DeadCodeSchema, handleDeadCode),
  'todos': defineHandler(TodosSchema, handleTodos),
  'entry-points': defineHandler(EntryPointsSchema, handleEntryPoints),
  'test-map': defineHandler(TestMapSchema, handleTestMap),
  'complexity': defineHandler(ComplexitySchema, handleComplexity),
};
