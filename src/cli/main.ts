#!/usr/bin/env node

/**
 * htnbench CLI entry point.
 * Commands live in ./run.ts.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerListCommand } from './run.js';

const program = new Command();

program
  .name('htnbench')
  .description(
    'Benchmark harness for HTN planners. Runs suites of planning problems under a timeout, repeats each one and plots the outcomes.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerListCommand(program);

await program.parseAsync();
