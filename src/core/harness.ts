import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type {
  AggregatedStat,
  BenchmarkSuite,
  ProblemInstance,
  RunResult,
} from '../schema/index.js';
import type { Planner } from '../planner/index.js';
import { LIMITS } from '../config/defaults.js';
import { aggregateInstance, aggregateSuite } from './aggregator.js';
import { mapWithConcurrency } from './concurrency.js';
import { ConfigError } from './errors.js';
import { repeatInstance } from './repeater.js';

// ── Public types ─────────────────────────────────────────────

export interface HarnessOptions {
  repetitions: number;
  timeoutSeconds: number;
  planDir: string;
  /** Instances run at once. Repetitions of one instance stay sequential. */
  concurrency?: number | undefined;
  signal?: AbortSignal | undefined;
  onInstanceStart?: ((instance: ProblemInstance, index: number) => void) | undefined;
  onResult?: ((result: RunResult) => void) | undefined;
}

export interface SuiteRun {
  suite: BenchmarkSuite;
  repetitions: number;
  timeoutSeconds: number;
  startedAt: Date;
  finishedAt: Date;
  /** One entry per instance, in suite order, each with `repetitions` results. */
  results: RunResult[][];
  instanceStats: AggregatedStat[];
  overall: AggregatedStat;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Collect run data for one suite. Rendering is left to the caller so that
 * a figure that cannot be written never costs the collected data.
 */
export async function runSuite(
  planner: Planner,
  suite: BenchmarkSuite,
  options: HarnessOptions,
): Promise<SuiteRun> {
  validateOptions(options);

  const concurrency = options.concurrency ?? 1;
  const planDir = path.join(options.planDir, suite.name);
  try {
    await mkdir(planDir, { recursive: true });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot create plan directory ${planDir}: ${detail}`);
  }
  const startedAt = new Date();

  // Parallel instances share one controller so a fatal error in one stops
  // the processes of the others.
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', forwardAbort, { once: true });
  if (options.signal?.aborted) controller.abort();

  let results: RunResult[][];
  try {
    results = await mapWithConcurrency(
      suite.instances,
      concurrency,
      async (instance, index) => {
        options.onInstanceStart?.(instance, index);
        try {
          return await repeatInstance(planner, instance, {
            domainPath: suite.domainPath,
            repetitions: options.repetitions,
            timeoutSeconds: options.timeoutSeconds,
            planDir,
            signal: controller.signal,
            onResult: options.onResult,
          });
        } catch (err) {
          controller.abort();
          throw err;
        }
      },
    );
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }

  const instanceStats = suite.instances.map((instance, i) =>
    aggregateInstance(instance.id, results[i] ?? []),
  );

  return {
    suite,
    repetitions: options.repetitions,
    timeoutSeconds: options.timeoutSeconds,
    startedAt,
    finishedAt: new Date(),
    results,
    instanceStats,
    overall: aggregateSuite(suite.name, results),
  };
}

// ── Validation ───────────────────────────────────────────────

function validateOptions(options: HarnessOptions): void {
  if (!Number.isInteger(options.repetitions) || options.repetitions < 1) {
    throw new ConfigError(
      `Repetitions must be a positive integer, got ${String(options.repetitions)}`,
    );
  }
  if (
    !Number.isFinite(options.timeoutSeconds) ||
    options.timeoutSeconds <= 0 ||
    options.timeoutSeconds > LIMITS.MAX_TIMEOUT_SECONDS
  ) {
    throw new ConfigError(
      `Timeout must be a positive number of seconds up to ${String(LIMITS.MAX_TIMEOUT_SECONDS)}, got ${String(options.timeoutSeconds)}`,
    );
  }
  const concurrency = options.concurrency ?? 1;
  if (
    !Number.isInteger(concurrency) ||
    concurrency < 1 ||
    concurrency > LIMITS.MAX_CONCURRENCY
  ) {
    throw new ConfigError(
      `Concurrency must be an integer between 1 and ${String(LIMITS.MAX_CONCURRENCY)}, got ${String(concurrency)}`,
    );
  }
}
