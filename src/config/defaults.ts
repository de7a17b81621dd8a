/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const DEFAULTS = {
  CONFIG_FILE: '.htnbench.yaml',
  PLANNER_COMMAND: 'hipop',
  BENCHMARK_ROOT: 'benchmarks/ipc2020-hierarchical',
  PLAN_DIR: 'plans',
  CONCURRENCY: 1,
} as const;

export const LIMITS = {
  MAX_CONCURRENCY: 64,
  // Largest deadline a Node timer can hold (2^31 - 1 ms).
  MAX_TIMEOUT_SECONDS: 2_147_483,
  STDERR_TAIL_BYTES: 2_048,
} as const;

export const ENV = {
  PLANNER: 'HTNBENCH_PLANNER',
  BENCHMARKS: 'HTNBENCH_BENCHMARKS',
  PLAN_DIR: 'HTNBENCH_PLAN_DIR',
} as const;
