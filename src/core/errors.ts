/**
 * Harness-level errors. Each carries the process exit code the CLI
 * reports for it. Per-run timeouts and failures are not errors: they are
 * recorded as RunResult outcomes.
 */

export abstract class HarnessError extends Error {
  abstract readonly exitCode: number;
}

export class ConfigError extends HarnessError {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UnknownSuiteError extends HarnessError {
  readonly exitCode = 2;
  readonly suite: string;

  constructor(suite: string, known: readonly string[]) {
    super(
      `Unknown suite "${suite}". Registered suites: ${known.length > 0 ? known.join(', ') : '(none)'}`,
    );
    this.name = 'UnknownSuiteError';
    this.suite = suite;
  }
}

export class SuiteUnavailableError extends HarnessError {
  readonly exitCode = 2;
  readonly suite: string;

  constructor(suite: string, reason: string) {
    super(`Suite "${suite}" is not available: ${reason}`);
    this.name = 'SuiteUnavailableError';
    this.suite = suite;
  }
}

export class ProcessSpawnError extends HarnessError {
  readonly exitCode = 3;
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot launch planner "${command}": ${detail}`, { cause });
    this.name = 'ProcessSpawnError';
    this.command = command;
  }
}

export class PlotRenderError extends HarnessError {
  readonly exitCode = 4;

  constructor(outputPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot render figure to ${outputPath}: ${detail}`, { cause });
    this.name = 'PlotRenderError';
  }
}

export class ReportWriteError extends HarnessError {
  readonly exitCode = 4;

  constructor(outputPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write report to ${outputPath}: ${detail}`, { cause });
    this.name = 'ReportWriteError';
  }
}

export class RunAbortedError extends HarnessError {
  readonly exitCode = 130;

  constructor() {
    super('Benchmark run interrupted');
    this.name = 'RunAbortedError';
  }
}
