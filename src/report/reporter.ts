import type {
  AggregatedStat,
  RunResult,
  SuiteReport,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputRun } from '../schema/jsonOutput.js';
import type { SuiteRun } from '../core/harness.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputRun };

// ── Report assembly ──────────────────────────────────────────

export function buildSuiteReport(run: SuiteRun, figurePath: string): SuiteReport {
  return {
    suite: run.suite.name,
    repetitions: run.repetitions,
    timeoutSeconds: run.timeoutSeconds,
    startedAt: run.startedAt.toISOString(),
    finishedAt: run.finishedAt.toISOString(),
    instances: run.instanceStats,
    overall: run.overall,
    results: run.results.flat(),
    figurePath,
  };
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(report: SuiteReport): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    suite: report.suite,
    repetitions: report.repetitions,
    timeoutSeconds: report.timeoutSeconds,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    figurePath: report.figurePath,
    overall: report.overall,
    instances: report.instances,
    runs: report.results.map(runToJSON),
  };
}

function runToJSON(r: RunResult): JsonOutputRun {
  return {
    instance: r.instanceId,
    repetition: r.repetition,
    outcome: r.outcome,
    elapsedSeconds: r.elapsedSeconds,
    exitCode: r.exitCode,
    planPath: r.planPath ?? null,
    reason: r.reason ?? null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: SuiteReport): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Benchmark Report: ${report.suite}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Suite** | ${report.suite} |`);
  lines.push(`| **Repetitions** | ${String(report.repetitions)} |`);
  lines.push(`| **Timeout** | ${String(report.timeoutSeconds)}s |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Figure** | ${report.figurePath} |`);
  lines.push(
    `| **Solved** | ${String(report.overall.successes)}/${String(report.overall.total)} (${formatRate(report.overall.successRate)}) |`,
  );
  lines.push(`| **Median time** | ${formatTime(report.overall.medianSeconds)} |`);
  lines.push('');

  // Instance table
  lines.push(`## Instances`);
  lines.push('');
  lines.push(`| Instance | Runs | Solved | Timeout | Failed | Rate | Mean | Median |`);
  lines.push(`|----------|------|--------|---------|--------|------|------|--------|`);

  for (const stat of report.instances) {
    lines.push(instanceRow(stat));
  }

  lines.push('');

  // Unsuccessful runs
  const problems = report.results.filter((r) => r.outcome !== 'success');
  if (problems.length > 0) {
    lines.push(`## Unsuccessful Runs`);
    lines.push('');
    for (const r of problems) {
      const reason = r.reason !== undefined ? `: ${escapeMarkdownCell(r.reason)}` : '';
      lines.push(
        `- \`${r.instanceId}\` #${String(r.repetition)} [${r.outcome.toUpperCase()}] after ${formatTime(r.elapsedSeconds)}${reason}`,
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function instanceRow(stat: AggregatedStat): string {
  return `| ${escapeMarkdownCell(stat.label)} | ${String(stat.total)} | ${String(stat.successes)} | ${String(stat.timeouts)} | ${String(stat.failures)} | ${formatRate(stat.successRate)} | ${formatTime(stat.meanSeconds)} | ${formatTime(stat.medianSeconds)} |`;
}

function formatTime(seconds: number | null): string {
  if (seconds === null) return '—';
  return `${seconds.toFixed(3)}s`;
}

function formatRate(rate: number): string {
  return `${String(Math.round(rate * 100))}%`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
