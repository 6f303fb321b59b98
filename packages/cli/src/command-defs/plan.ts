/**
 * Plan Command Definitions
 */

import { z } from 'zod';

export const planGenerateSchema = z.object({
  config: z.string().min(1),
  input: z.string().min(1),
  out: z.string().optional(),
  matrixDirectory: z.string().min(1).optional(),
  format: z.enum(['json', 'summary']).default('json'),
});

export type PlanGenerateArgs = z.infer<typeof planGenerateSchema>;
