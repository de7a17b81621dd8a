/**
 * Schema module.
 * Zod schemas for suites, run results, config files and JSON output; the
 * TypeScript types are inferred from them.
 */

export * from './suite.js';
export * from './results.js';
export * from './config.js';
export * from './jsonOutput.js';
