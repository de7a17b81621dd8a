import path from 'node:path';

import { glob } from 'tinyglobby';

import type {
  BenchmarkSuite,
  CatalogEntry,
  ProblemInstance,
  SuiteCatalog,
} from '../schema/index.js';
import { ConfigError, SuiteUnavailableError, UnknownSuiteError } from '../core/errors.js';

// ── Registry ─────────────────────────────────────────────────

/**
 * Immutable table of benchmark suites, built once at startup and passed
 * to whoever needs it. Suites named by the catalog whose files could not
 * be found are kept apart with the reason, so that resolving them reports
 * something more useful than "unknown".
 */
export class SuiteRegistry {
  private readonly suites: ReadonlyMap<string, BenchmarkSuite>;
  private readonly missing: ReadonlyMap<string, string>;

  constructor(
    suites: readonly BenchmarkSuite[],
    unavailable: ReadonlyMap<string, string> = new Map(),
  ) {
    const table = new Map<string, BenchmarkSuite>();
    for (const suite of suites) {
      if (table.has(suite.name)) {
        throw new Error(`Duplicate suite name "${suite.name}"`);
      }
      table.set(suite.name, freezeSuite(suite));
    }
    this.suites = table;
    this.missing = new Map(unavailable);
    Object.freeze(this);
  }

  resolve(name: string): BenchmarkSuite {
    const suite = this.suites.get(name);
    if (suite) return suite;

    const reason = this.missing.get(name);
    if (reason !== undefined) {
      throw new SuiteUnavailableError(name, reason);
    }
    throw new UnknownSuiteError(name, this.names());
  }

  has(name: string): boolean {
    return this.suites.has(name);
  }

  names(): string[] {
    return [...this.suites.keys()];
  }

  unavailable(): Array<{ name: string; reason: string }> {
    return [...this.missing].map(([name, reason]) => ({ name, reason }));
  }
}

/**
 * The suite restricted to its first `max` instances in natural order, for
 * benchmarking a prefix of a large suite.
 */
export function firstInstances(suite: BenchmarkSuite, max: number | undefined): BenchmarkSuite {
  if (max === undefined || suite.instances.length <= max) return suite;
  if (!Number.isInteger(max) || max < 1) {
    throw new ConfigError(`Instance limit must be a positive integer, got ${String(max)}`);
  }
  return freezeSuite({ ...suite, instances: suite.instances.slice(0, max) });
}

function freezeSuite(suite: BenchmarkSuite): BenchmarkSuite {
  const instances = suite.instances.map((i) => Object.freeze({ ...i }));
  Object.freeze(instances);
  return Object.freeze({ ...suite, instances });
}

// ── Discovery ────────────────────────────────────────────────

/**
 * Expand the catalog's glob patterns under `benchmarkRoot` and build the
 * registry. Problem files are ordered by natural sort, so `p2` comes
 * before `p10`.
 */
export async function loadSuiteRegistry(
  catalog: SuiteCatalog,
  benchmarkRoot: string,
): Promise<SuiteRegistry> {
  const root = path.resolve(benchmarkRoot);
  const found = new Map<string, BenchmarkSuite>();
  const unavailable = new Map<string, string>();

  for (const entry of catalog.suites) {
    const resolved = await discoverSuite(entry, root, found, unavailable);
    if (typeof resolved === 'string') {
      unavailable.set(entry.name, resolved);
    } else {
      found.set(entry.name, resolved);
    }
  }

  return new SuiteRegistry([...found.values()], unavailable);
}

async function discoverSuite(
  entry: CatalogEntry,
  root: string,
  found: ReadonlyMap<string, BenchmarkSuite>,
  unavailable: ReadonlyMap<string, string>,
): Promise<BenchmarkSuite | string> {
  let domainPath: string;

  if (entry.domain !== undefined) {
    const [first] = await expand(entry.domain, root);
    if (first === undefined) {
      return `no domain file matches ${entry.domain} under ${root}`;
    }
    domainPath = first;
  } else {
    const baseName = entry.variantOf ?? '';
    const base = found.get(baseName);
    if (!base) {
      const baseReason = unavailable.get(baseName);
      return baseReason !== undefined
        ? `base suite "${baseName}" is not available (${baseReason})`
        : `base suite "${baseName}" must be declared before "${entry.name}"`;
    }
    domainPath = base.domainPath;
  }

  const problems = (await expand(entry.problems, root)).filter(
    (p) => p !== domainPath,
  );
  if (problems.length === 0) {
    return `no problem files match ${entry.problems} under ${root}`;
  }

  const instances: ProblemInstance[] = [];
  const seen = new Set<string>();
  for (const problemPath of problems) {
    const id = instanceId(problemPath);
    if (seen.has(id)) {
      return `two problem files share the instance id "${id}"`;
    }
    seen.add(id);
    instances.push({ id, problemPath });
  }

  return {
    name: entry.name,
    domainPath,
    instances,
    ...(entry.variantOf !== undefined ? { variantOf: entry.variantOf } : {}),
  };
}

// ── Helpers ──────────────────────────────────────────────────

async function expand(pattern: string, root: string): Promise<string[]> {
  const files = await glob(pattern, { cwd: root, absolute: true, onlyFiles: true });
  return files.sort(naturalCompare);
}

export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true, sensitivity: 'base' });
}

export function instanceId(problemPath: string): string {
  return path.basename(problemPath, path.extname(problemPath));
}
