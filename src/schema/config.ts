import { z } from 'zod';

import { catalogEntrySchema } from './suite.js';

// ── Planner block ───────────────────────────────────────────

export const plannerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional().default([]),
});

export type PlannerConfig = z.infer<typeof plannerConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  planner: plannerConfigSchema.optional(),
  benchmarks: z.string().min(1).optional(),
  planDir: z.string().min(1).optional(),
  catalog: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
  maxInstances: z.number().int().positive().optional(),
  suites: z.array(catalogEntrySchema).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
