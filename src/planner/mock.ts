import type { RunAttempt, RunOutcome } from '../schema/index.js';
import type { Planner, SolveRequest } from './client.js';

export interface MockAttempt {
  outcome: RunOutcome;
  elapsedSeconds: number;
  exitCode?: number | null | undefined;
  reason?: string | undefined;
}

export interface MockPlanner extends Planner {
  readonly calls: readonly SolveRequest[];
}

const DEFAULT_ATTEMPT: MockAttempt = { outcome: 'success', elapsedSeconds: 0.5 };

/**
 * In-memory planner for tests and dry runs. Cycles through the canned
 * attempts (or asks `script` for one), never spawns anything, and keeps
 * the same elapsed/outcome invariants as the process planner: elapsed is
 * clamped to the timeout and a timeout always reports the full budget.
 */
export function createMockPlanner(
  script?: readonly MockAttempt[] | ((request: SolveRequest, call: number) => MockAttempt),
): MockPlanner {
  const calls: SolveRequest[] = [];

  return {
    name: 'mock',
    calls,

    async solve(request: SolveRequest): Promise<RunAttempt> {
      const call = calls.length;
      calls.push(request);

      const attempt =
        typeof script === 'function'
          ? script(request, call)
          : (script?.[call % script.length] ?? DEFAULT_ATTEMPT);

      return toRunAttempt(attempt, request);
    },
  };
}

function toRunAttempt(attempt: MockAttempt, request: SolveRequest): RunAttempt {
  const limit = request.timeoutSeconds;

  if (attempt.outcome === 'timeout' || attempt.elapsedSeconds >= limit) {
    return {
      outcome: 'timeout',
      elapsedSeconds: limit,
      exitCode: null,
      reason: attempt.reason ?? `killed after the ${String(limit)}s deadline`,
    };
  }

  if (attempt.outcome === 'success') {
    return {
      outcome: 'success',
      elapsedSeconds: attempt.elapsedSeconds,
      planPath: request.planOutputPath,
      exitCode: 0,
    };
  }

  return {
    outcome: 'failure',
    elapsedSeconds: attempt.elapsedSeconds,
    exitCode: attempt.exitCode === undefined ? 1 : attempt.exitCode,
    reason: attempt.reason ?? 'exit code 1',
  };
}
