/**
 * Core orchestration module.
 * Coordinates registry → repeater → aggregator for one suite.
 * No CLI, no rendering; the planner is reached only through its interface.
 */

export * from './errors.js';
export { repeatInstance, planPathFor } from './repeater.js';
export type { RepeatOptions } from './repeater.js';
export { aggregateInstance, aggregateSuite, mean, median, stdDev } from './aggregator.js';
export { mapWithConcurrency } from './concurrency.js';
export { runSuite } from './harness.js';
export type { HarnessOptions, SuiteRun } from './harness.js';
