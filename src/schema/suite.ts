import { z } from 'zod';

// ── ProblemInstance ─────────────────────────────────────────

export const problemInstanceSchema = z.object({
  id: z.string().min(1),
  problemPath: z.string().min(1),
});

export type ProblemInstance = z.infer<typeof problemInstanceSchema>;

// ── BenchmarkSuite ──────────────────────────────────────────
// Instance order is significant: it is the order of the plot's x axis.

export const benchmarkSuiteSchema = z.object({
  name: z.string().min(1),
  domainPath: z.string().min(1),
  instances: z.array(problemInstanceSchema),
  variantOf: z.string().min(1).optional(),
});

export type BenchmarkSuite = z.infer<typeof benchmarkSuiteSchema>;

// ── Catalog entries ─────────────────────────────────────────
// Paths are glob patterns relative to the benchmark root.
// A variant may omit `domain` and borrow the domain of `variantOf`.

export const catalogEntrySchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/, 'suite names may only contain letters, digits, ".", "_" and "-"'),
    domain: z.string().min(1).optional(),
    problems: z.string().min(1),
    variantOf: z.string().min(1).optional(),
  })
  .refine((entry) => entry.domain !== undefined || entry.variantOf !== undefined, {
    message: 'a suite needs either "domain" or "variantOf"',
  });

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

export const suiteCatalogSchema = z.object({
  suites: z.array(catalogEntrySchema).min(1),
});

export type SuiteCatalog = z.infer<typeof suiteCatalogSchema>;
