/**
 * Suite module.
 * Builds the immutable suite registry from a catalog of glob patterns.
 */

export {
  SuiteRegistry,
  firstInstances,
  loadSuiteRegistry,
  naturalCompare,
  instanceId,
} from './registry.js';
export { DEFAULT_CATALOG_PATH, loadCatalog, mergeCatalog } from './catalog.js';
