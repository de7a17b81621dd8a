import path from 'node:path';

import type { FileConfig, PlannerConfig } from '../schema/index.js';
import { DEFAULTS, ENV } from '../config/defaults.js';
import { DEFAULT_CATALOG_PATH } from '../suites/catalog.js';

// ── Public types ─────────────────────────────────────────────

export interface RunFlags {
  planner?: string | undefined;
  benchmarks?: string | undefined;
  planDir?: string | undefined;
  catalog?: string | undefined;
  concurrency?: number | undefined;
  maxInstances?: number | undefined;
}

export interface RunSettings {
  planner: PlannerConfig;
  benchmarkRoot: string;
  planDir: string;
  catalogPath: string;
  concurrency: number;
  /** Only the first this-many instances of each suite are benchmarked. */
  maxInstances?: number | undefined;
}

// ── Merge ────────────────────────────────────────────────────

/**
 * Merge settings: CLI flags, then config file, then environment, then
 * defaults. A `--planner` flag is split on whitespace into command and
 * leading arguments.
 */
export function resolveRunSettings(
  flags: RunFlags,
  file: FileConfig,
  env: NodeJS.ProcessEnv,
): RunSettings {
  const planner =
    flags.planner !== undefined
      ? splitCommand(flags.planner)
      : (file.planner ??
        splitCommand(env[ENV.PLANNER] ?? DEFAULTS.PLANNER_COMMAND));

  return {
    planner,
    benchmarkRoot: path.resolve(
      flags.benchmarks ?? file.benchmarks ?? env[ENV.BENCHMARKS] ?? DEFAULTS.BENCHMARK_ROOT,
    ),
    planDir: path.resolve(flags.planDir ?? file.planDir ?? env[ENV.PLAN_DIR] ?? DEFAULTS.PLAN_DIR),
    catalogPath: path.resolve(flags.catalog ?? file.catalog ?? DEFAULT_CATALOG_PATH),
    concurrency: flags.concurrency ?? file.concurrency ?? DEFAULTS.CONCURRENCY,
    maxInstances: flags.maxInstances ?? file.maxInstances,
  };
}

export function splitCommand(commandLine: string): PlannerConfig {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}

// ── Per-suite output paths ───────────────────────────────────

export function defaultFigurePath(suite: string, repetitions: number, timeoutSeconds: number): string {
  return `${suite}-N${String(repetitions)}-T${String(timeoutSeconds)}.pdf`;
}

/**
 * Output path for one suite. `{suite}` in the template is replaced; when
 * several suites share a template without it, the suite name is inserted
 * before the extension so figures do not overwrite each other.
 */
export function outputPathFor(template: string, suite: string, suiteCount: number): string {
  if (template.includes('{suite}')) {
    return template.replaceAll('{suite}', suite);
  }
  if (suiteCount <= 1) return template;

  const ext = path.extname(template);
  const stem = template.slice(0, template.length - ext.length);
  return `${stem}-${suite}${ext}`;
}
