// src/registry/load.ts
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { RegistryConfigError } from '../engine/errors.js';
import type { ConversionTable, TestDefinition } from '../engine/types.js';
import { createRegistry, type LabRegistry } from './registry.js';

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const TESTS_FILE = 'lab-tests.json';
export const CONVERSIONS_FILE = 'unit-conversions.json';

const rangeSchema = z.object({ low: z.number().finite(), high: z.number().finite() });

const templateSchema = z.object({
  explanation: z.string().min(1),
  whyItMatters: z.string().min(1),
  nextSteps: z.string().min(1),
});

const baseTestSchema = z.object({
  code: z.string().regex(/^[A-Z0-9]+$/, 'test codes are upper-case alphanumerics'),
  name: z.string().min(1),
  category: z.string().min(1),
  unit: z.string().min(1),
  borderlineRange: rangeSchema.optional(),
  criticalThresholds: z.object({
    low: z.number().finite().optional(),
    high: z.number().finite().optional(),
  }),
  templates: z.object({
    low: templateSchema,
    normal: templateSchema,
    high: templateSchema,
    borderline: templateSchema.optional(),
    critical_low: templateSchema,
    critical_high: templateSchema,
  }),
});

const testSchema = z.discriminatedUnion('sexSpecific', [
  baseTestSchema.extend({
    sexSpecific: z.literal(true),
    referenceRanges: z.object({ male: rangeSchema, female: rangeSchema }),
  }),
  baseTestSchema.extend({
    sexSpecific: z.literal(false),
    referenceRanges: z.object({ default: rangeSchema }),
  }),
]);

const testsFileSchema = z.object({ tests: z.array(testSchema).min(1) });

const conversionsFileSchema = z.object({
  conversions: z.record(
    z.string(),
    z.record(
      z.string(),
      z.object({
        factor: z.number().finite(),
        kind: z.enum(['multiply', 'mmolPerMolToPercent']),
      })
    )
  ),
});

function readJson<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): z.infer<S> {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (e) {
    throw new RegistryConfigError([`${path}: ${e instanceof Error ? e.message : String(e)}`]);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryConfigError(
      parsed.error.issues.map(i => `${file}: ${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return parsed.data;
}

/** Reads and validates the bundled (or given) data directory. */
export function loadRegistry(dir: string = DEFAULT_DATA_DIR): LabRegistry {
  const { tests } = readJson(dir, TESTS_FILE, testsFileSchema);
  const { conversions } = readJson(dir, CONVERSIONS_FILE, conversionsFileSchema);
  const definitions: TestDefinition[] = tests;
  const table: ConversionTable = conversions;
  return createRegistry(definitions, table);
}
