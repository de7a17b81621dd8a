import path from 'node:path';

import type { ProblemInstance, RunResult } from '../schema/index.js';
import type { Planner } from '../planner/index.js';
import { HarnessError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RepeatOptions {
  domainPath: string;
  repetitions: number;
  timeoutSeconds: number;
  /** Plan files land in `<planDir>/<instance>.<repetition>.plan`. */
  planDir: string;
  signal?: AbortSignal | undefined;
  onResult?: ((result: RunResult) => void) | undefined;
}

// ── Repeater ─────────────────────────────────────────────────

/**
 * Run one instance `repetitions` times, strictly in index order.
 *
 * A timeout or failure is data and never stops the next repetition.
 * Unexpected errors inside one repetition are recorded as a failure of
 * that repetition; harness errors (spawn failure, interrupt) propagate.
 */
export async function repeatInstance(
  planner: Planner,
  instance: ProblemInstance,
  options: RepeatOptions,
): Promise<RunResult[]> {
  const results: RunResult[] = [];

  for (let repetition = 0; repetition < options.repetitions; repetition++) {
    const planOutputPath = planPathFor(options.planDir, instance.id, repetition);
    let result: RunResult;

    try {
      const attempt = await planner.solve({
        domainPath: options.domainPath,
        problemPath: instance.problemPath,
        planOutputPath,
        timeoutSeconds: options.timeoutSeconds,
        signal: options.signal,
      });
      result = { ...attempt, instanceId: instance.id, repetition };
    } catch (err) {
      if (err instanceof HarnessError) throw err;
      result = {
        instanceId: instance.id,
        repetition,
        outcome: 'failure',
        elapsedSeconds: 0,
        exitCode: null,
        reason: err instanceof Error ? err.message : String(err),
      };
    }

    Object.freeze(result);
    results.push(result);
    options.onResult?.(result);
  }

  return results;
}

export function planPathFor(planDir: string, instanceId: string, repetition: number): string {
  return path.join(planDir, `${instanceId}.${String(repetition)}.plan`);
}
