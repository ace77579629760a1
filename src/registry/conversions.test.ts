import { describe, it, expect } from 'vitest';
import { applyConversion, convertUnit, HBA1C_PERCENT_OFFSET } from './conversions.js';
import { createRegistry } from './registry.js';
import { InvalidInputError, UnsupportedConversionError } from '../engine/errors.js';
import { glucoseLike, hemoglobinLike } from '../test-utils.js';

const registry = createRegistry([glucoseLike(), hemoglobinLike()], {
  GLU: { 'mmol/L': { factor: 18, kind: 'multiply' } },
});

function conversionError(fn: () => unknown): UnsupportedConversionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof UnsupportedConversionError) return e;
    throw e;
  }
  throw new Error('expected an UnsupportedConversionError');
}

describe('applyConversion', () => {
  it('multiplies by the factor', () => {
    expect(applyConversion(6.5, { factor: 18, kind: 'multiply' })).toBe(117);
  });

  it('applies the HbA1c offset for mmol/mol', () => {
    expect(HBA1C_PERCENT_OFFSET).toBe(2.15);
    expect(applyConversion(0, { factor: 0.0915, kind: 'mmolPerMolToPercent' })).toBe(2.15);
    expect(applyConversion(20, { factor: 0.0915, kind: 'mmolPerMolToPercent' })).toBeCloseTo(3.98, 10);
  });
});

describe('convertUnit', () => {
  it('converts a registered alternate unit into the primary unit', () => {
    expect(convertUnit(registry, 'GLU', 5.5, 'mmol/L', 'mg/dL')).toBe(99);
  });

  it('returns the value untouched when it is already in the primary unit', () => {
    expect(convertUnit(registry, 'HGB', 14.2, 'g/dL', 'g/dL')).toBe(14.2);
  });

  it('fails for a test without conversions', () => {
    const e = conversionError(() => convertUnit(registry, 'HGB', 8.7, 'mmol/L', 'g/dL'));
    expect(e.message).toBe('Unit conversion not supported for HGB. Expected unit: g/dL, received: mmol/L');
    expect(e.kind).toBe('unsupported_conversion');
    expect(e.supportedUnits).toEqual(['g/dL']);
  });

  it('fails for an unregistered unit and names the supported ones', () => {
    const e = conversionError(() => convertUnit(registry, 'GLU', 1, 'mg/L', 'mg/dL'));
    expect(e.message).toBe('Cannot convert mg/L to mg/dL for GLU. Supported units: mg/dL, mmol/L');
    expect(e.fromUnit).toBe('mg/L');
    expect(e.supportedUnits).toEqual(['mg/dL', 'mmol/L']);
  });

  it('only converts into the primary unit', () => {
    const e = conversionError(() => convertUnit(registry, 'GLU', 100, 'mg/dL', 'mmol/L'));
    expect(e.message).toBe('Cannot convert mg/dL to mmol/L for GLU. Supported units: mg/dL, mmol/L');
  });

  it('rejects NaN and infinite values instead of converting them', () => {
    expect(() => convertUnit(registry, 'GLU', NaN, 'mmol/L', 'mg/dL')).toThrow(InvalidInputError);
    expect(() => convertUnit(registry, 'GLU', -Infinity, 'mmol/L', 'mg/dL')).toThrow(
      'GLU value must be a finite number, got -Infinity'
    );
  });

  it('fails for unknown tests', () => {
    const e = conversionError(() => convertUnit(registry, 'TSH', 2, 'mIU/L', 'uIU/mL'));
    expect(e.message).toBe('Unit conversion not supported for TSH. Expected unit: uIU/mL, received: mIU/L');
    expect(e.supportedUnits).toEqual([]);
  });
});
