import type { AggregatedStat, RunResult, StatScope } from '../schema/index.js';

// ── Public API ───────────────────────────────────────────────

export function aggregateInstance(
  instanceId: string,
  results: readonly RunResult[],
): AggregatedStat {
  return summarize('instance', instanceId, results);
}

/**
 * Roll a whole suite into one record. `perInstance` is in registry order;
 * time statistics are taken over every successful run of the suite.
 */
export function aggregateSuite(
  suiteName: string,
  perInstance: ReadonlyArray<readonly RunResult[]>,
): AggregatedStat {
  return summarize('suite', suiteName, perInstance.flat());
}

// ── Statistics ───────────────────────────────────────────────

function summarize(
  scope: StatScope,
  label: string,
  results: readonly RunResult[],
): AggregatedStat {
  let successes = 0;
  let timeouts = 0;
  let failures = 0;
  const times: number[] = [];

  for (const r of results) {
    switch (r.outcome) {
      case 'success':
        successes++;
        times.push(r.elapsedSeconds);
        break;
      case 'timeout':
        timeouts++;
        break;
      case 'failure':
        failures++;
        break;
    }
  }

  const total = results.length;

  return {
    scope,
    label,
    total,
    successes,
    timeouts,
    failures,
    successRate: total > 0 ? successes / total : 0,
    meanSeconds: mean(times),
    medianSeconds: median(times),
    minSeconds: times.length > 0 ? Math.min(...times) : null,
    maxSeconds: times.length > 0 ? Math.max(...times) : null,
    stdDevSeconds: stdDev(times),
  };
}

// null is the "no data" sentinel for an empty sample.

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/** Population standard deviation. */
export function stdDev(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null) return null;
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}
