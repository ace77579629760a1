// src/registry/conversions.ts
import { assertFiniteValue, UnsupportedConversionError } from '../engine/errors.js';
import type { UnitConversion } from '../engine/types.js';
import type { LabRegistry } from './registry.js';

// HbA1c: % (NGSP) = mmol/mol (IFCC) * 0.0915 + 2.15
export const HBA1C_PERCENT_OFFSET = 2.15;

export function applyConversion(value: number, conversion: UnitConversion): number {
  switch (conversion.kind) {
    case 'multiply':
      return value * conversion.factor;
    case 'mmolPerMolToPercent':
      return value * conversion.factor + HBA1C_PERCENT_OFFSET;
  }
}

/**
 * Converts a value into the test's primary unit. Only explicitly registered
 * (test, unit) pairs convert; anything else throws.
 */
export function convertUnit(
  registry: LabRegistry,
  testCode: string,
  value: number,
  fromUnit: string,
  toUnit: string
): number {
  assertFiniteValue(value, `${testCode} value`);
  const primary = registry.get(testCode)?.unit;
  if (fromUnit === toUnit && toUnit === primary) return value;

  const conversions = registry.conversionsFor(testCode);
  if (!conversions || primary === undefined) {
    throw new UnsupportedConversionError(
      `Unit conversion not supported for ${testCode}. Expected unit: ${toUnit}, received: ${fromUnit}`,
      testCode,
      fromUnit,
      primary === undefined ? [] : [primary]
    );
  }

  const supportedUnits = [primary, ...conversions.keys()];
  const conversion = conversions.get(fromUnit);
  if (!conversion || toUnit !== primary) {
    throw new UnsupportedConversionError(
      `Cannot convert ${fromUnit} to ${toUnit} for ${testCode}. Supported units: ${supportedUnits.join(', ')}`,
      testCode,
      fromUnit,
      supportedUnits
    );
  }
  return applyConversion(value, conversion);
}
