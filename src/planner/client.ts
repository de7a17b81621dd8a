import type { RunAttempt } from '../schema/index.js';

// ── Planner interface ────────────────────────────────────────

/**
 * One planner invocation: solve `problemPath` in `domainPath` and write
 * the plan to `planOutputPath`, within `timeoutSeconds` of wall time.
 */
export interface SolveRequest {
  domainPath: string;
  problemPath: string;
  planOutputPath: string;
  timeoutSeconds: number;
  signal?: AbortSignal | undefined;
}

/**
 * The external planner seen as a capability. Implementations classify
 * the attempt themselves: per-run timeouts and failures resolve as
 * outcomes, only harness-level problems (the planner cannot be launched
 * at all, the run was interrupted) reject.
 */
export interface Planner {
  readonly name: string;
  solve(request: SolveRequest): Promise<RunAttempt>;
}
