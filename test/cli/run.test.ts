import { readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Command, CommanderError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { registerListCommand, registerRunCommand } from '../../src/cli/run.js';
import { FAKE_PLANNER, makeTempDir, removeDir, touchFiles } from '../helpers.js';

function buildProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerRunCommand(program);
  registerListCommand(program);
  return program;
}

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch {
    return false;
  }
}

describe('htnbench CLI', () => {
  let dir: string;
  let stdout: string[];

  beforeEach(async () => {
    dir = await makeTempDir();
    stdout = [];
    process.exitCode = undefined;
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });

    await touchFiles(path.join(dir, 'bench'), [
      'rover/domain.hddl',
      'rover/problems/pfile1.hddl',
      'rover/problems/pfile2.hddl',
    ]);
    await writeFile(
      path.join(dir, 'catalog.json'),
      JSON.stringify({
        suites: [
          { name: 'rover', domain: 'rover/domain.hddl', problems: 'rover/problems/*.hddl' },
          { name: 'satellite', domain: 'satellite/domain.hddl', problems: 'satellite/*.hddl' },
        ],
      }),
      'utf-8',
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await removeDir(dir);
  });

  async function writeConfig(plannerArgs: string[], command = process.execPath): Promise<string> {
    const file = path.join(dir, 'htnbench.json');
    await writeFile(
      file,
      JSON.stringify({
        planner: { command, args: plannerArgs },
        benchmarks: path.join(dir, 'bench'),
        planDir: path.join(dir, 'plans'),
        catalog: path.join(dir, 'catalog.json'),
      }),
      'utf-8',
    );
    return file;
  }

  it('benchmarks a suite, keeps the run data and writes the figure', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);
    const figure = path.join(dir, 'rover-N2-T10.svg');

    await buildProgram().parseAsync(
      ['rover', '-N', '2', '-T', '10', '--config', config, '--savefig', figure, '--json'],
      { from: 'user' },
    );

    expect(process.exitCode).toBeUndefined();
    expect(await exists(figure)).toBe(true);

    const summary: unknown = JSON.parse(
      await readFile(path.join(dir, 'plans', 'rover', 'summary.json'), 'utf-8'),
    );
    expect(summary).toMatchObject({
      suite: 'rover',
      repetitions: 2,
      timeoutSeconds: 10,
      figurePath: figure,
      overall: { total: 4, successes: 4, timeouts: 0, failures: 0 },
    });
    expect(await exists(path.join(dir, 'plans', 'rover', 'pfile2.1.plan'))).toBe(true);
    expect(stdout.join('')).toContain('"suite": "rover"');
  });

  it('counts failing runs as data and still exits 0', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'fail']);
    const figure = path.join(dir, 'rover.svg');
    const report = path.join(dir, 'rover.md');

    await buildProgram().parseAsync(
      ['rover', '-N', '3', '-T', '10', '--config', config, '--savefig', figure, '--report', report],
      { from: 'user' },
    );

    expect(process.exitCode).toBeUndefined();
    expect(await readFile(figure, 'utf-8')).toContain('>no successful runs</text>');
    expect(await readFile(report, 'utf-8')).toContain('| pfile1 | 3 | 0 | 0 | 3 | 0% | — | — |');
  });

  it('exits 2 on an unknown suite without running or plotting anything', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);
    const figure = path.join(dir, 'foo.pdf');

    await buildProgram().parseAsync(
      ['foo', '-N', '1', '-T', '1', '--config', config, '--savefig', figure],
      { from: 'user' },
    );

    expect(process.exitCode).toBe(2);
    expect(await exists(figure)).toBe(false);
    expect(await exists(path.join(dir, 'plans'))).toBe(false);
  });

  it('exits 2 before running when one of several suites has no files', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);

    await buildProgram().parseAsync(
      ['rover', 'satellite', '-N', '1', '-T', '1', '--config', config],
      { from: 'user' },
    );

    expect(process.exitCode).toBe(2);
    expect(await exists(path.join(dir, 'plans'))).toBe(false);
  });

  it('exits 2 on an unsupported figure format', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);

    await buildProgram().parseAsync(
      ['rover', '-N', '1', '-T', '1', '--config', config, '--savefig', path.join(dir, 'x.png')],
      { from: 'user' },
    );

    expect(process.exitCode).toBe(2);
  });

  it('exits 3 when the planner cannot be launched', async () => {
    const config = await writeConfig([], path.join(dir, 'no-such-planner'));

    await buildProgram().parseAsync(
      ['rover', '-N', '1', '-T', '1', '--config', config, '--savefig', path.join(dir, 'r.pdf')],
      { from: 'user' },
    );

    expect(process.exitCode).toBe(3);
    expect(await exists(path.join(dir, 'r.pdf'))).toBe(false);
  });

  it('exits 4 when the markdown report cannot be written, keeping the run data', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory\n', 'utf-8');
    const figure = path.join(dir, 'rover.svg');

    await buildProgram().parseAsync(
      [
        'rover', '-N', '1', '-T', '10', '--config', config,
        '--savefig', figure, '--report', path.join(blocker, 'rover.md'),
      ],
      { from: 'user' },
    );

    expect(process.exitCode).toBe(4);
    expect(await exists(path.join(dir, 'plans', 'rover', 'summary.json'))).toBe(true);
    expect(await exists(figure)).toBe(false);
  });

  it('benchmarks only the first instances when a limit is given', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);

    await buildProgram().parseAsync(
      [
        'rover', '-N', '2', '-T', '10', '--config', config,
        '--savefig', path.join(dir, 'rover.svg'), '--max-instances', '1',
      ],
      { from: 'user' },
    );

    expect(process.exitCode).toBeUndefined();
    const summary: unknown = JSON.parse(
      await readFile(path.join(dir, 'plans', 'rover', 'summary.json'), 'utf-8'),
    );
    expect(summary).toMatchObject({
      overall: { total: 2, successes: 2 },
      instances: [{ label: 'pfile1', total: 2 }],
    });
    expect(await exists(path.join(dir, 'plans', 'rover', 'pfile2.0.plan'))).toBe(false);
  });

  it('rejects a timeout longer than a timer can hold before running anything', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);

    await expect(
      buildProgram().parseAsync(['rover', '-N', '1', '-T', '2200000', '--config', config], {
        from: 'user',
      }),
    ).rejects.toBeInstanceOf(CommanderError);
    expect(await exists(path.join(dir, 'plans'))).toBe(false);
  });

  it('requires the repetition count', async () => {
    await expect(
      buildProgram().parseAsync(['rover', '-T', '10'], { from: 'user' }),
    ).rejects.toBeInstanceOf(CommanderError);
  });

  it('lists available suites on stdout', async () => {
    const config = await writeConfig([FAKE_PLANNER, 'solve']);

    await buildProgram().parseAsync(['list', '--config', config], { from: 'user' });

    expect(stdout.join('')).toBe('rover\t2 instances\n');
    expect(process.exitCode).toBeUndefined();
  });
});
