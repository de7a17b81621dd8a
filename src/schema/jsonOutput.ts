import { z } from 'zod';

import { aggregatedStatSchema, runOutcomeSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Run output ──────────────────────────────────────────────

export const jsonOutputRunSchema = z.object({
  instance: z.string().min(1),
  repetition: z.number().int().nonnegative(),
  outcome: runOutcomeSchema,
  elapsedSeconds: z.number().nonnegative(),
  exitCode: z.number().int().nullable(),
  planPath: z.string().nullable(),
  reason: z.string().nullable(),
});

export type JsonOutputRun = z.infer<typeof jsonOutputRunSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  suite: z.string().min(1),
  repetitions: z.number().int().positive(),
  timeoutSeconds: z.number().positive(),
  startedAt: z.string(),
  finishedAt: z.string(),
  figurePath: z.string(),
  overall: aggregatedStatSchema,
  instances: z.array(aggregatedStatSchema),
  runs: z.array(jsonOutputRunSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
