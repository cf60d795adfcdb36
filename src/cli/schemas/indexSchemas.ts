import { z } from 'zod';

export const ScanSchema = z.object({
  dir: z.string().default('.'),
  json: z.boolean().default(false),
});

export type ScanInput = z.infer<typeof ScanSchema>;
