import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runSuite } from '../../src/core/harness.js';
import { ConfigError, ProcessSpawnError, RunAbortedError } from '../../src/core/errors.js';
import { createMockPlanner } from '../../src/planner/mock.js';
import type { MockAttempt } from '../../src/planner/mock.js';
import type { Planner, SolveRequest } from '../../src/planner/index.js';
import type { BenchmarkSuite } from '../../src/schema/index.js';
import { makeTempDir, removeDir } from '../helpers.js';

const suite: BenchmarkSuite = {
  name: 'rover',
  domainPath: '/bench/rover/domain.hddl',
  instances: [
    { id: 'pfile01', problemPath: '/bench/rover/pfile01.hddl' },
    { id: 'pfile02', problemPath: '/bench/rover/pfile02.hddl' },
    { id: 'pfile03', problemPath: '/bench/rover/pfile03.hddl' },
  ],
};

// Deterministic planner: pfile01 is easy, pfile02 always fails, pfile03
// alternates between a 4s solve and a timeout.
function scripted(request: SolveRequest, call: number): MockAttempt {
  if (request.problemPath.endsWith('pfile01.hddl')) {
    return { outcome: 'success', elapsedSeconds: 1 + call / 100 };
  }
  if (request.problemPath.endsWith('pfile02.hddl')) {
    return { outcome: 'failure', elapsedSeconds: 0.2 };
  }
  return call % 2 === 0 ? { outcome: 'success', elapsedSeconds: 4 } : { outcome: 'timeout', elapsedSeconds: 10 };
}

describe('runSuite', () => {
  let planRoot: string;

  beforeEach(async () => {
    planRoot = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(planRoot);
  });

  it('produces exactly instances × repetitions results, in suite order', async () => {
    const run = await runSuite(createMockPlanner(), suite, {
      repetitions: 5,
      timeoutSeconds: 10,
      planDir: planRoot,
    });

    expect(run.results).toHaveLength(3);
    expect(run.results.flat()).toHaveLength(15);
    expect(run.results.map((rs) => rs[0]?.instanceId)).toEqual(['pfile01', 'pfile02', 'pfile03']);
    expect(run.instanceStats.map((s) => s.label)).toEqual(['pfile01', 'pfile02', 'pfile03']);
    expect(run.overall.total).toBe(15);
    expect(run.results.flat().every((r) => r.elapsedSeconds <= 10)).toBe(true);
  });

  it('puts plan files under a directory named after the suite', async () => {
    const planner = createMockPlanner();

    await runSuite(planner, suite, { repetitions: 1, timeoutSeconds: 10, planDir: planRoot });

    expect(planner.calls.map((c) => c.planOutputPath)).toEqual([
      path.join(planRoot, 'rover', 'pfile01.0.plan'),
      path.join(planRoot, 'rover', 'pfile02.0.plan'),
      path.join(planRoot, 'rover', 'pfile03.0.plan'),
    ]);
  });

  it('yields identical outcome sequences for a deterministic planner', async () => {
    const options = { repetitions: 4, timeoutSeconds: 10, planDir: planRoot };

    const first = await runSuite(createMockPlanner(scripted), suite, options);
    const second = await runSuite(createMockPlanner(scripted), suite, options);

    const outcomes = (run: typeof first) => run.results.map((rs) => rs.map((r) => r.outcome));
    expect(outcomes(first)).toEqual(outcomes(second));
  });

  it('aggregates each instance separately', async () => {
    const run = await runSuite(
      createMockPlanner([
        { outcome: 'success', elapsedSeconds: 2 },
        { outcome: 'timeout', elapsedSeconds: 10 },
      ]),
      suite,
      { repetitions: 2, timeoutSeconds: 10, planDir: planRoot },
    );

    for (const stat of run.instanceStats) {
      expect(stat.successes).toBe(1);
      expect(stat.timeouts).toBe(1);
      expect(stat.meanSeconds).toBe(2);
    }
    expect(run.overall.successRate).toBe(0.5);
  });

  it('keeps suite order when instances run concurrently', async () => {
    const delays: Record<string, number> = { pfile01: 40, pfile02: 5, pfile03: 20 };
    const planner: Planner = {
      name: 'slow',
      async solve(request) {
        const id = request.planOutputPath.split('/').pop()?.split('.')[0] ?? '';
        await new Promise((resolve) => setTimeout(resolve, delays[id] ?? 0));
        return { outcome: 'success', elapsedSeconds: 1, planPath: request.planOutputPath, exitCode: 0 };
      },
    };

    const run = await runSuite(planner, suite, {
      repetitions: 2,
      timeoutSeconds: 10,
      planDir: planRoot,
      concurrency: 3,
    });

    expect(run.results.map((rs) => rs.map((r) => `${r.instanceId}.${String(r.repetition)}`))).toEqual([
      ['pfile01.0', 'pfile01.1'],
      ['pfile02.0', 'pfile02.1'],
      ['pfile03.0', 'pfile03.1'],
    ]);
  });

  it('reports zero successes with null timings when every run fails', async () => {
    const run = await runSuite(
      createMockPlanner([{ outcome: 'failure', elapsedSeconds: 0.1 }]),
      suite,
      { repetitions: 3, timeoutSeconds: 10, planDir: planRoot },
    );

    for (const stat of run.instanceStats) {
      expect(stat.total).toBe(3);
      expect(stat.successes).toBe(0);
      expect(stat.failures).toBe(3);
      expect(stat.meanSeconds).toBeNull();
      expect(stat.medianSeconds).toBeNull();
    }
    expect(run.overall.successes).toBe(0);
  });

  it('stops the whole suite when the planner cannot be launched', async () => {
    const planner: Planner = {
      name: 'missing',
      solve: () => Promise.reject(new ProcessSpawnError('missing', new Error('ENOENT'))),
    };

    await expect(
      runSuite(planner, suite, { repetitions: 2, timeoutSeconds: 10, planDir: planRoot }),
    ).rejects.toBeInstanceOf(ProcessSpawnError);
  });

  it('passes an aborted signal through to the planner', async () => {
    const controller = new AbortController();
    controller.abort();
    const planner: Planner = {
      name: 'abortable',
      async solve(request) {
        if (request.signal?.aborted) throw new RunAbortedError();
        return { outcome: 'success', elapsedSeconds: 1, planPath: request.planOutputPath, exitCode: 0 };
      },
    };

    await expect(
      runSuite(planner, suite, {
        repetitions: 1,
        timeoutSeconds: 10,
        planDir: planRoot,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RunAbortedError);
  });

  it.each([
    { repetitions: 0, timeoutSeconds: 10 },
    { repetitions: 1.5, timeoutSeconds: 10 },
    { repetitions: 3, timeoutSeconds: 0 },
    { repetitions: 3, timeoutSeconds: Number.NaN },
    { repetitions: 3, timeoutSeconds: 10, concurrency: 0 },
    { repetitions: 3, timeoutSeconds: 2_200_000 },
  ])('rejects invalid options %o before running anything', async (options) => {
    const planner = createMockPlanner();

    await expect(runSuite(planner, suite, { ...options, planDir: planRoot })).rejects.toBeInstanceOf(
      ConfigError,
    );
    expect(planner.calls).toHaveLength(0);
  });

  it('creates the suite plan directory before the first run', async () => {
    const planner = createMockPlanner();

    await runSuite(planner, suite, { repetitions: 1, timeoutSeconds: 10, planDir: planRoot });

    expect(planner.calls).toHaveLength(3);
    await expect(writeFile(path.join(planRoot, 'rover', 'marker.txt'), '')).resolves.toBeUndefined();
  });

  it('fails with a config error when the plan directory cannot be created', async () => {
    const blocker = path.join(planRoot, 'blocker');
    await writeFile(blocker, 'not a directory\n', 'utf-8');
    const planner = createMockPlanner();

    const run = runSuite(planner, suite, { repetitions: 2, timeoutSeconds: 10, planDir: blocker });

    await expect(run).rejects.toBeInstanceOf(ConfigError);
    await expect(run).rejects.toThrow(`Cannot create plan directory ${path.join(blocker, 'rover')}`);
    expect(planner.calls).toHaveLength(0);
  });
});
