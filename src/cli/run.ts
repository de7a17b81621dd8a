import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type { BenchmarkSuite, FileConfig, SuiteReport } from '../schema/index.js';
import { DEFAULTS, LIMITS } from '../config/defaults.js';
import { loadConfigFile } from '../config/loader.js';
import { ConfigError, HarnessError, ReportWriteError } from '../core/errors.js';
import { runSuite } from '../core/harness.js';
import { createPlanner } from '../planner/index.js';
import { firstInstances, loadCatalog, loadSuiteRegistry, mergeCatalog } from '../suites/index.js';
import type { SuiteRegistry } from '../suites/index.js';
import {
  buildSuiteReport,
  figureFormat,
  generateJSON,
  generateMarkdown,
  renderFigure,
  serializeJSON,
} from '../report/index.js';
import * as log from '../utils/logger.js';
import {
  defaultFigurePath,
  outputPathFor,
  resolveRunSettings,
} from './settings.js';
import type { RunFlags, RunSettings } from './settings.js';

// ── Option parsing ───────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseTimeoutSeconds(value: string): number {
  const n = parsePositiveInt(value);
  if (n > LIMITS.MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(
      `Expected at most ${String(LIMITS.MAX_TIMEOUT_SECONDS)} seconds.`,
    );
  }
  return n;
}

interface CommonOptions {
  config?: string;
  planner?: string;
  benchmarks?: string;
  planDir?: string;
  catalog?: string;
}

interface RunOptions extends CommonOptions {
  repetitions: number;
  timeout: number;
  savefig?: string;
  report?: string;
  json?: true;
  concurrency?: number;
  maxInstances?: number;
}

// ── Shared setup ─────────────────────────────────────────────

interface Workspace {
  fileConfig: FileConfig;
  settings: RunSettings;
  registry: SuiteRegistry;
}

async function openWorkspace(
  opts: CommonOptions,
  runFlags: Pick<RunFlags, 'concurrency' | 'maxInstances'> = {},
): Promise<Workspace> {
  // A config file named on the command line must exist; the default may not.
  const fileConfig = await loadConfigFile(
    opts.config ?? DEFAULTS.CONFIG_FILE,
    opts.config !== undefined,
  );

  const flags: RunFlags = {
    planner: opts.planner,
    benchmarks: opts.benchmarks,
    planDir: opts.planDir,
    catalog: opts.catalog,
    concurrency: runFlags.concurrency,
    maxInstances: runFlags.maxInstances,
  };
  const settings = resolveRunSettings(flags, fileConfig, process.env);

  const catalog = mergeCatalog(await loadCatalog(settings.catalogPath), fileConfig.suites ?? []);
  const registry = await loadSuiteRegistry(catalog, settings.benchmarkRoot);

  return { fileConfig, settings, registry };
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', `Path to config file (default: ${DEFAULTS.CONFIG_FILE})`)
    .option('--planner <command>', 'Planner command line (domain, problem and plan paths are appended)')
    .option('--benchmarks <dir>', 'Benchmark root the suite catalog is relative to')
    .option('--plan-dir <dir>', 'Directory for plan files and run summaries')
    .option('--catalog <path>', 'Suite catalog JSON file');
}

async function writeArtifact(outputPath: string, content: string): Promise<void> {
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  } catch (err) {
    throw new ReportWriteError(outputPath, err);
  }
}

function reportFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  log.error(`Error: ${message}`);
  process.exitCode = err instanceof HarnessError ? err.exitCode : 1;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: SuiteReport): void {
  const o = report.overall;
  process.stderr.write(`\n--- htnbench Result ---\n`);
  process.stderr.write(`Suite:    ${report.suite}\n`);
  process.stderr.write(
    `Runs:     ${String(o.successes)} solved, ${String(o.timeouts)} timed out, ${String(o.failures)} failed (of ${String(o.total)})\n`,
  );
  process.stderr.write(
    `Median:   ${o.medianSeconds !== null ? `${o.medianSeconds.toFixed(3)}s` : 'no data'}\n`,
  );
  process.stderr.write(`Figure:   ${report.figurePath}\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  const command = program
    .command('run', { isDefault: true })
    .description('Benchmark the planner on one or more suites and plot the results')
    .argument('<suites...>', 'Suite names, e.g. rover p-rover')
    .requiredOption('-N, --repetitions <n>', 'Runs per problem instance', parsePositiveInt)
    .requiredOption('-T, --timeout <seconds>', 'Wall-clock timeout per run, in seconds', parseTimeoutSeconds)
    .option('--savefig <path>', 'Figure path (.pdf or .svg); "{suite}" is replaced by the suite name')
    .option('--report <path>', 'Also write a markdown report; "{suite}" is replaced by the suite name')
    .option('--json', 'Output the JSON summary of each suite to stdout')
    .option('--concurrency <n>', 'Instances benchmarked at the same time', parsePositiveInt)
    .option('--max-instances <n>', 'Benchmark only the first n problems of each suite', parsePositiveInt);

  addCommonOptions(command).action(async (suiteNames: string[], opts: RunOptions) => {
    const controller = new AbortController();
    const interrupt = (): void => controller.abort();
    process.once('SIGINT', interrupt);
    process.once('SIGTERM', interrupt);

    try {
      const { settings, registry } = await openWorkspace(opts, {
        concurrency: opts.concurrency,
        maxInstances: opts.maxInstances,
      });

      // 1. Resolve every suite and output path before anything runs
      const suites: BenchmarkSuite[] = suiteNames.map((name) =>
        firstInstances(registry.resolve(name), settings.maxInstances),
      );
      const figurePaths = suites.map((s) =>
        path.resolve(
          opts.savefig !== undefined
            ? outputPathFor(opts.savefig, s.name, suites.length)
            : defaultFigurePath(s.name, opts.repetitions, opts.timeout),
        ),
      );
      for (const figurePath of figurePaths) {
        if (figureFormat(figurePath) === null) {
          throw new ConfigError(`Unsupported figure format for ${figurePath} (use .pdf or .svg)`);
        }
      }

      const planner = createPlanner(settings.planner);
      log.info(`Planner: ${planner.name}`);

      for (const [i, suite] of suites.entries()) {
        const figurePath = figurePaths[i] ?? defaultFigurePath(suite.name, opts.repetitions, opts.timeout);

        // 2. Collect
        log.section(suite.name);
        log.suite(suite.name, suite.instances.length, opts.repetitions, opts.timeout);
        const run = await runSuite(planner, suite, {
          repetitions: opts.repetitions,
          timeoutSeconds: opts.timeout,
          planDir: settings.planDir,
          concurrency: settings.concurrency,
          signal: controller.signal,
          onInstanceStart: (instance, index) =>
            log.instance(index, suite.instances.length, instance.id),
          onResult: (result) => log.runResult(result, opts.repetitions),
        });

        // 3. Persist the data before rendering can fail
        const report = buildSuiteReport(run, figurePath);
        const json = serializeJSON(generateJSON(report));
        const summaryPath = path.join(settings.planDir, suite.name, 'summary.json');
        await writeArtifact(summaryPath, json + '\n');
        log.detail(`Run data written to ${summaryPath}`);

        if (opts.json) {
          process.stdout.write(json + '\n');
        }
        if (opts.report !== undefined) {
          const reportPath = path.resolve(outputPathFor(opts.report, suite.name, suites.length));
          await writeArtifact(reportPath, generateMarkdown(report));
          log.detail(`Report written to ${reportPath}`);
        }

        // 4. Render
        await renderFigure(
          {
            suite: suite.name,
            repetitions: run.repetitions,
            timeoutSeconds: run.timeoutSeconds,
            instances: run.instanceStats,
            overall: run.overall,
          },
          figurePath,
        );
        log.figure(figurePath);
        printSummary(report);
      }
    } catch (err) {
      reportFailure(err);
    } finally {
      process.removeListener('SIGINT', interrupt);
      process.removeListener('SIGTERM', interrupt);
    }
  });
}

export function registerListCommand(program: Command): void {
  const command = program
    .command('list')
    .description('List the registered benchmark suites');

  addCommonOptions(command).action(async (opts: CommonOptions) => {
    try {
      const { settings, registry } = await openWorkspace(opts);
      log.info(`Benchmark root: ${settings.benchmarkRoot}`);

      for (const name of registry.names()) {
        const suite = registry.resolve(name);
        const variant = suite.variantOf !== undefined ? `  (variant of ${suite.variantOf})` : '';
        process.stdout.write(`${name}\t${String(suite.instances.length)} instances${variant}\n`);
      }
      for (const { name, reason } of registry.unavailable()) {
        log.warn(`${name}: ${reason}`);
      }
    } catch (err) {
      reportFailure(err);
    }
  });
}
