/**
 * Planner abstraction module.
 * The external planner is an opaque capability: solve one problem within
 * a deadline. Only module allowed to spawn planner processes.
 */

import type { PlannerConfig } from '../schema/index.js';
import { ConfigError } from '../core/errors.js';
import type { Planner } from './client.js';
import { createProcessPlanner } from './process.js';

export * from './client.js';
export { createProcessPlanner } from './process.js';
export type { ProcessPlannerOptions } from './process.js';
export { createMockPlanner } from './mock.js';
export type { MockAttempt, MockPlanner } from './mock.js';

// ── Factory ──────────────────────────────────────────────────

export function createPlanner(config: PlannerConfig): Planner {
  if (config.command.trim().length === 0) {
    throw new ConfigError('A planner command is required');
  }
  return createProcessPlanner({ command: config.command, args: config.args });
}
