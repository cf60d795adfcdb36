import { z } from 'zod';
import { defaultQueryDefaults } from '../../core/config';

const defaults = defaultQueryDefaults();

export const ImpactSchema = z.object({
  target: z.string().min(1, 'target is required'),
  path: z.string().default('.'),
  depth: z.coerce.number().int().nonnegative().default(defaults.impactDepth),
  max: z.coerce.number().int().positive().default(defaults.impactMax),
  json: z.boolean().default(false),
});

export const DeadCodeSchema = z.object({
  path: z.string().default('.'),
  kind: z.string().optional(),
  pathPrefix: z.string().optional(),
  max: z.coerce.number().int().nonnegative().default(defaults.deadCodeMax),
  json: z.boolean().default(false),
});

export const TodosSchema = z.object({
  path: z.string().default('.'),
  tag: z.string().transform((s) => s.trim().toUpperCase()).pipe(z.enum(['TODO', 'FIXME', 'HACK', 'XXX'])).optional(),
  max: z.coerce.number().int().positive().default(defaults.todosMax),
  json: z.boolean().default(false),
});

export const EntryPointsSchema = z.object({
  path: z.string().default('.'),
  kind: z.string().transform((s) => s.trim().toLowerCase()).pipe(z.enum(['main', 'route', 'cli', 'init'])).optional(),
  max: z.coerce.number().int().positive().default(defaults.entryPointsMax),
  json: z.boolean().default(false),
});

export const TestMapSchema = z
  .object({
    path: z.string().default('.'),
    pathPrefix: z.string().optional(),
    tested: z.boolean().default(false),
    untested: z.boolean().default(false),
    max: z.coerce.number().int().nonnegative().default(0),
    json: z.boolean().default(false),
  })
  .refine((v) => !(v.tested && v.untested), { message: '--tested and --untested cannot be combined' });

export const ComplexitySchema = z.object({
  file: z.string().optional(),
  path: z.string().default('.'),
  max: z.coerce.number().int().nonnegative().default(defaults.complexityMax),
  min: z.coerce.number().int().nonnegative().default(0),
  json: z.boolean().default(false),
});

export type ImpactInput = z.infer<typeof ImpactSchema>;
export type DeadCodeInput = z.infer<typeof DeadCodeSchema>;
export type TodosInput = z.infer<typeof TodosSchema>;
export type EntryPointsInput = z.infer<typeof EntryPointsSchema>;
export type TestMapInput = z.infer<typeof TestMapSchema>;
export type ComplexityInput = z.infer<typeof ComplexitySchema>;
