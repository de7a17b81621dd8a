/**
 * Live execution logger for htnbench.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { RunResult } from '../schema/index.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function suite(name: string, instances: number, repetitions: number, timeoutSeconds: number): void {
  write(
    `📦 ${name}: ${String(instances)} instances × ${String(repetitions)} runs, ${String(timeoutSeconds)}s timeout`,
  );
}

export function instance(index: number, total: number, id: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${id}`);
}

export function runResult(result: RunResult, repetitions: number): void {
  const icon =
    result.outcome === 'success' ? '✅' : result.outcome === 'timeout' ? '⏱️ ' : '❌';
  const reason = result.reason !== undefined ? ` (${result.reason})` : '';
  write(
    `   ${icon} ${result.instanceId} #${String(result.repetition + 1)}/${String(repetitions)} ${result.elapsedSeconds.toFixed(3)}s${reason}`,
  );
}

export function figure(outputPath: string): void {
  write(`📊 Figure written to ${outputPath}`);
}
