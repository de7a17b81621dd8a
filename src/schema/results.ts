import { z } from 'zod';

// ── RunOutcome ────────────────────────────────────────────────

export const runOutcomeSchema = z.enum(['success', 'timeout', 'failure']);

export type RunOutcome = z.infer<typeof runOutcomeSchema>;

// ── RunAttempt ────────────────────────────────────────────────
// What one planner invocation yields, before the repeater stamps it
// with the instance and repetition it belongs to.

export const runAttemptSchema = z.object({
  outcome: runOutcomeSchema,
  elapsedSeconds: z.number().nonnegative(),
  planPath: z.string().min(1).optional(),
  exitCode: z.number().int().nullable(),
  reason: z.string().optional(),
});

export type RunAttempt = z.infer<typeof runAttemptSchema>;

// ── RunResult ─────────────────────────────────────────────────

export const runResultSchema = runAttemptSchema.extend({
  instanceId: z.string().min(1),
  repetition: z.number().int().nonnegative(),
});

export type RunResult = z.infer<typeof runResultSchema>;

// ── AggregatedStat ────────────────────────────────────────────
// Time statistics cover successful runs only and are null ("no data")
// when there are none.

export const statScopeSchema = z.enum(['instance', 'suite']);

export type StatScope = z.infer<typeof statScopeSchema>;

export const aggregatedStatSchema = z.object({
  scope: statScopeSchema,
  label: z.string().min(1),
  total: z.number().int().nonnegative(),
  successes: z.number().int().nonnegative(),
  timeouts: z.number().int().nonnegative(),
  failures: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(1),
  meanSeconds: z.number().nonnegative().nullable(),
  medianSeconds: z.number().nonnegative().nullable(),
  minSeconds: z.number().nonnegative().nullable(),
  maxSeconds: z.number().nonnegative().nullable(),
  stdDevSeconds: z.number().nonnegative().nullable(),
});

export type AggregatedStat = z.infer<typeof aggregatedStatSchema>;

// ── SuiteReport ───────────────────────────────────────────────

export const suiteReportSchema = z.object({
  suite: z.string().min(1),
  repetitions: z.number().int().positive(),
  timeoutSeconds: z.number().positive(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  instances: z.array(aggregatedStatSchema),
  overall: aggregatedStatSchema,
  results: z.array(runResultSchema),
  figurePath: z.string().min(1),
});

export type SuiteReport = z.infer<typeof suiteReportSchema>;
