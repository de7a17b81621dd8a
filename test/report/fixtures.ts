import type { AggregatedStat } from '../../src/schema/index.js';

export function stat(
  label: string,
  counts: { successes: number; timeouts?: number; failures?: number },
  times: { mean: number; median?: number; min?: number; max?: number } | null,
  scope: 'instance' | 'suite' = 'instance',
): AggregatedStat {
  const timeouts = counts.timeouts ?? 0;
  const failures = counts.failures ?? 0;
  const total = counts.successes + timeouts + failures;
  return {
    scope,
    label,
    total,
    successes: counts.successes,
    timeouts,
    failures,
    successRate: total > 0 ? counts.successes / total : 0,
    meanSeconds: times?.mean ?? null,
    medianSeconds: times ? (times.median ?? times.mean) : null,
    minSeconds: times ? (times.min ?? times.mean) : null,
    maxSeconds: times ? (times.max ?? times.mean) : null,
    stdDevSeconds: times ? 0 : null,
  };
}
