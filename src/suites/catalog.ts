import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { ZodError } from 'zod';

import { suiteCatalogSchema } from '../schema/index.js';
import type { CatalogEntry, SuiteCatalog } from '../schema/index.js';
import { ConfigError } from '../core/errors.js';

// ── Built-in catalog path ────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = path.join(THIS_DIR, '..', '..', 'suites', 'ipc2020.json');

// ── Loading ──────────────────────────────────────────────────

export async function loadCatalog(
  catalogPath: string = DEFAULT_CATALOG_PATH,
): Promise<SuiteCatalog> {
  let raw: string;
  try {
    raw = await readFile(catalogPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read suite catalog ${catalogPath}: ${message}`);
  }

  try {
    return suiteCatalogSchema.parse(JSON.parse(raw));
  } catch (err) {
    const message =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
        : err instanceof Error
          ? err.message
          : String(err);
    throw new ConfigError(`Invalid suite catalog ${catalogPath}: ${message}`);
  }
}

/**
 * Overlay extra entries (from the config file) on a catalog. An entry
 * with a known name replaces it in place; new names are appended.
 */
export function mergeCatalog(
  base: SuiteCatalog,
  extra: readonly CatalogEntry[],
): SuiteCatalog {
  const suites = [...base.suites];
  for (const entry of extra) {
    const index = suites.findIndex((s) => s.name === entry.name);
    if (index === -1) {
      suites.push(entry);
    } else {
      suites[index] = entry;
    }
  }
  return { suites };
}
