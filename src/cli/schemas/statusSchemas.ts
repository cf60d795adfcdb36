import { z } from 'zod';

export const StatusSchema = z.object({
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export const StaleSchema = z.object({
  path: z.string().default('.'),
  json: z.boolean().default(false),
});

export type StatusInput = z.infer<typeof StatusSchema>;
export type StaleInput = z.infer<typeof StaleSchema>;
