import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { mkdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import type { RunAttempt } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { ConfigError, ProcessSpawnError, RunAbortedError } from '../core/errors.js';
import type { Planner, SolveRequest } from './client.js';

// ── Public types ─────────────────────────────────────────────

export interface ProcessPlannerOptions {
  command: string;
  /** Arguments placed before the domain/problem/plan positionals. */
  args?: readonly string[] | undefined;
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  stderrTailBytes?: number | undefined;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  elapsedMs: number;
  timedOut: boolean;
  aborted: boolean;
  stderr: string;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Planner backed by an external executable, invoked as
 * `<command> [...args] <domain> <problem> <plan>`.
 *
 * The child is started in its own process group and the whole group is
 * SIGKILLed when the deadline passes, when the run is aborted, and after
 * the child exits, so nothing it forked outlives the run.
 */
export function createProcessPlanner(options: ProcessPlannerOptions): Planner {
  const extraArgs = options.args ?? [];
  const tailBytes = options.stderrTailBytes ?? LIMITS.STDERR_TAIL_BYTES;

  return {
    name: [options.command, ...extraArgs].join(' '),

    async solve(request: SolveRequest): Promise<RunAttempt> {
      if (request.timeoutSeconds > LIMITS.MAX_TIMEOUT_SECONDS) {
        throw new ConfigError(
          `Timeout of ${String(request.timeoutSeconds)}s exceeds the ${String(LIMITS.MAX_TIMEOUT_SECONDS)}s timer limit`,
        );
      }
      const planPath = request.planOutputPath;
      await mkdir(path.dirname(planPath), { recursive: true });
      await rm(planPath, { force: true });

      if (request.signal?.aborted) {
        throw new RunAbortedError();
      }

      const exit = await runProcess(
        options.command,
        [...extraArgs, request.domainPath, request.problemPath, planPath],
        request,
        options,
        tailBytes,
      );

      if (exit.aborted) {
        await rm(planPath, { force: true });
        throw new RunAbortedError();
      }

      const elapsedSeconds = exit.elapsedMs / 1000;

      if (exit.timedOut || elapsedSeconds >= request.timeoutSeconds) {
        await rm(planPath, { force: true });
        return {
          outcome: 'timeout',
          elapsedSeconds: request.timeoutSeconds,
          exitCode: null,
          reason: `killed after the ${String(request.timeoutSeconds)}s deadline`,
        };
      }

      const planWritten = await isFile(planPath);
      if (exit.code === 0 && planWritten) {
        return {
          outcome: 'success',
          elapsedSeconds,
          planPath,
          exitCode: 0,
        };
      }

      await rm(planPath, { force: true });
      return {
        outcome: 'failure',
        elapsedSeconds,
        exitCode: exit.code,
        reason: describeFailure(exit),
      };
    },
  };
}

// ── Process handling ─────────────────────────────────────────

function runProcess(
  command: string,
  args: string[],
  request: SolveRequest,
  options: ProcessPlannerOptions,
  tailBytes: number,
): Promise<ProcessExit> {
  return new Promise<ProcessExit>((resolve, reject) => {
    const started = performance.now();
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: process.platform !== 'win32',
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let exited: Omit<ProcessExit, 'stderr'> | undefined;

    child.stderr?.setEncoding('utf-8');
    child.stderr?.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-tailBytes);
    });

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(child);
    }, request.timeoutSeconds * 1000);

    const onAbort = (): void => {
      aborted = true;
      killGroup(child);
    };
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const release = (): void => {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
    };

    child.once('error', (err) => {
      release();
      killGroup(child);
      if (exited === undefined) {
        reject(new ProcessSpawnError(command, err));
      }
    });

    child.once('exit', (code, signal) => {
      exited = {
        code,
        signal,
        elapsedMs: performance.now() - started,
        timedOut,
        aborted,
      };
      release();
      // Descendants may still hold the group (and the stderr pipe) open.
      killGroup(child);
    });

    child.once('close', () => {
      if (exited !== undefined) {
        resolve({ ...exited, stderr });
      }
    });
  });
}

function killGroup(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined) return;

  if (process.platform === 'win32') {
    child.kill('SIGKILL');
    return;
  }

  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group is already gone.
    if (!hasCode(err, 'ESRCH')) throw err;
  }
}

// ── Helpers ──────────────────────────────────────────────────

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (err) {
    if (hasCode(err, 'ENOENT')) return false;
    throw err;
  }
}

function hasCode(err: unknown, code: string): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === code
  );
}

function describeFailure(exit: ProcessExit): string {
  const base =
    exit.signal !== null
      ? `terminated by ${exit.signal}`
      : exit.code !== 0
        ? `exit code ${String(exit.code)}`
        : 'exited 0 without writing a plan file';

  const tail = lastLine(exit.stderr);
  return tail.length > 0 ? `${base}: ${tail}` : base;
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return (lines[lines.length - 1] ?? '').trim();
}
