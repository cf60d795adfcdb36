import { z } from 'zod';
import { defaultQueryDefaults } from '../../core/config';

const defaults = defaultQueryDefaults();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const LookupSchema = z.object({
  query: z.string().min(1, 'query is required'),
  path: z.string().default('.'),
  max: positiveInt(defaults.lookupMax),
  exact: z.boolean().default(false),
  json: z.boolean().default(false),
});

export const SearchSchema = z.object({
  pattern: z.string().min(1, 'pattern is required'),
  path: z.string().default('.'),
  max: positiveInt(defaults.searchMax),
  json: z.boolean().default(false),
});

export const RefsSchema = z.object({
  symbol: z.string().min(1, 'symbol is required'),
  path: z.string().default('.'),
  max: positiveInt(defaults.refsMax),
  json: z.boolean().default(false),
});

export const OutlineSchema = z.object({
  file: z.string().min(1, 'file is required'),
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export const SymbolsSchema = z.object({
  /** Empty lists every declaration, usually narrowed with `kind`. */
  query: z.string().default(''),
  path: z.string().default('.'),
  kind: z.string().optional(),
  max: positiveInt(defaults.symbolsMax),
  json: z.boolean().default(false),
});

export const ExportsSchema = z.object({
  scope: z.string().min(1, 'scope is required'),
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export const ContextSchema = z.object({
  file: z.string().min(1, 'file is required'),
  symbol: z.string().min(1, 'symbol is required'),
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export const LocateSchema = z.object({
  query: z.string().min(1, 'query is required'),
  path: z.string().default('.'),
  max: positiveInt(defaults.locateMax),
  json: z.boolean().default(false),
});

export type LookupInput = z.infer<typeof LookupSchema>;
export type SearchInput = z.infer<typeof SearchSchema>;
export type RefsInput = z.infer<typeof RefsSchema>;
export type OutlineInput = z.infer<typeof OutlineSchema>;
export type SymbolsInput = z.infer<typeof SymbolsSchema>;
export type ExportsInput = z.infer<typeof ExportsSchema>;
export type ContextInput = z.infer<typeof ContextSchema>;
export type LocateInput = z.infer<typeof LocateSchema>;
