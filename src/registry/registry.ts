// src/registry/registry.ts
import { RegistryConfigError } from '../engine/errors.js';
import type { ConversionTable, NumericRange, TestDefinition, TestListing, UnitConversion } from '../engine/types.js';

export interface LabRegistry {
  get(code: string): TestDefinition | undefined;
  codes(): string[];
  list(): TestListing[];
  conversionsFor(code: string): ReadonlyMap<string, UnitConversion> | undefined;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function referenceRangesOf(def: TestDefinition): [string, NumericRange][] {
  return def.sexSpecific
    ? [['male', def.referenceRanges.male], ['female', def.referenceRanges.female]]
    : [['default', def.referenceRanges.default]];
}

function checkDefinition(def: TestDefinition): string[] {
  const problems: string[] = [];
  const ranges = referenceRangesOf(def);

  for (const [key, r] of ranges) {
    if (!(r.low <= r.high)) problems.push(`${def.code}: ${key} reference range low ${r.low} exceeds high ${r.high}`);
  }

  const b = def.borderlineRange;
  if (b) {
    if (!(b.low <= b.high)) problems.push(`${def.code}: borderline range low ${b.low} exceeds high ${b.high}`);
    for (const [key, r] of ranges) {
      if (b.low < r.high) {
        problems.push(`${def.code}: borderline range starts at ${b.low}, inside the ${key} reference range (high ${r.high})`);
      }
    }
    if (!def.templates.borderline) problems.push(`${def.code}: borderline range defined without a "borderline" template`);
  } else if (def.templates.borderline) {
    problems.push(`${def.code}: "borderline" template defined without a borderline range`);
  }

  const { low, high } = def.criticalThresholds;
  if (low !== undefined && high !== undefined && !(low < high)) {
    problems.push(`${def.code}: critical low ${low} is not below critical high ${high}`);
  }
  return problems;
}

function checkConversions(tests: Map<string, TestDefinition>, conversions: ConversionTable): string[] {
  const problems: string[] = [];
  for (const [code, units] of Object.entries(conversions)) {
    const def = tests.get(code);
    if (!def) {
      problems.push(`conversions defined for unknown test ${code}`);
      continue;
    }
    for (const [unit, c] of Object.entries(units)) {
      if (unit === def.unit) problems.push(`${code}: conversion from its own primary unit ${unit}`);
      if (!(c.factor > 0)) problems.push(`${code}: conversion factor for ${unit} must be positive`);
    }
  }
  return problems;
}

/**
 * Builds the immutable registry the engine reads from. Every configuration
 * problem is collected and reported in a single RegistryConfigError.
 */
export function createRegistry(definitions: readonly TestDefinition[], conversions: ConversionTable = {}): LabRegistry {
  const tests = new Map<string, TestDefinition>();
  const problems: string[] = [];

  for (const def of definitions) {
    if (tests.has(def.code)) problems.push(`duplicate test code ${def.code}`);
    problems.push(...checkDefinition(def));
    tests.set(def.code, deepFreeze(structuredClone(def)));
  }
  problems.push(...checkConversions(tests, conversions));
  if (problems.length) throw new RegistryConfigError(problems);

  const conversionMaps = new Map<string, ReadonlyMap<string, UnitConversion>>(
    Object.entries(conversions).map(([code, units]) => [
      code,
      new Map(Object.entries(units).map(([unit, c]) => [unit, Object.freeze({ ...c })])),
    ])
  );

  const listings: TestListing[] = [...tests.values()].map(def => ({
    code: def.code,
    name: def.name,
    category: def.category,
    unit: def.unit,
    sexSpecific: def.sexSpecific,
    alternateUnits: [...(conversionMaps.get(def.code)?.keys() ?? [])],
  }));

  return {
    get: code => tests.get(code),
    codes: () => [...tests.keys()],
    list: () => listings.map(l => ({ ...l, alternateUnits: [...l.alternateUnits] })),
    conversionsFor: code => conversionMaps.get(code),
  };
}
