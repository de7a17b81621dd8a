/**
 * CLI module: the `run` and `list` commands, setting precedence and
 * per-suite output paths. Errors become exit codes here.
 */

export {
  registerRunCommand,
  registerListCommand,
  parsePositiveInt,
  parseTimeoutSeconds,
} from './run.js';
export {
  resolveRunSettings,
  splitCommand,
  defaultFigurePath,
  outputPathFor,
} from './settings.js';
export type { RunFlags, RunSettings } from './settings.js';
