import { z } from 'zod';

export const RelatedSchema = z.object({
  file: z.string().min(1, 'file is required'),
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export const GraphSchema = z.object({
  path: z.string().default('.'),
  focus: z.string().optional(),
  /** 0 means unlimited. */
  depth: z.coerce.number().int().nonnegative().default(0),
  format: z.enum(['list', 'dot']).default('list'),
  json: z.boolean().default(false),
});

export const ScopeSchema = z.object({
  dir: z.string().default('.'),
  path: z.string().default('.'),
  recursive: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type RelatedInput = z.infer<typeof RelatedSchema>;
export type GraphInput = z.infer<typeof GraphSchema>;
export type ScopeInput = z.infer<typeof ScopeSchema>;
