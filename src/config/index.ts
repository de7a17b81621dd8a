/**
 * Configuration module.
 * The optional `.htnbench.yaml` file plus the defaults flags and
 * environment variables fall back to.
 */

export { DEFAULTS, LIMITS, ENV } from './defaults.js';
export { loadConfigFile } from './loader.js';
