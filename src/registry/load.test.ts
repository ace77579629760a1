import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadRegistry, DEFAULT_DATA_DIR, TESTS_FILE, CONVERSIONS_FILE } from './load.js';
import { RegistryConfigError } from '../engine/errors.js';

describe('loadRegistry (bundled data)', () => {
  const registry = loadRegistry();

  it('loads every supported test in file order', () => {
    expect(registry.codes()).toEqual([
      'HB', 'PCV', 'WBC', 'PLT', 'FBG', 'HBA1C', 'CREAT', 'UREA',
      'ALT', 'AST', 'TBIL', 'TCHOL', 'LDL', 'HDL', 'TRIG',
    ]);
  });

  it('defines borderline ranges for the glucose and cholesterol family only', () => {
    const withBorderline = registry.codes().filter(c => registry.get(c)?.borderlineRange);
    expect(withBorderline).toEqual(['FBG', 'HBA1C', 'TCHOL', 'LDL', 'TRIG']);
  });

  it('lists alternate units from the conversion table', () => {
    const creat = registry.list().find(t => t.code === 'CREAT');
    expect(creat?.unit).toBe('mg/dL');
    expect(creat?.sexSpecific).toBe(true);
    expect(creat?.alternateUnits).toContain('umol/L');
    expect(registry.conversionsFor('HBA1C')?.get('mmol/mol')).toEqual({ factor: 0.0915, kind: 'mmolPerMolToPercent' });
  });
});

describe('loadRegistry (custom directory)', () => {
  let dir: string;
  const bundledTests = readFileSync(join(DEFAULT_DATA_DIR, TESTS_FILE), 'utf8');

  function problems(): string[] {
    try {
      loadRegistry(dir);
    } catch (e) {
      if (e instanceof RegistryConfigError) return e.problems;
      throw e;
    }
    throw new Error('expected loadRegistry to fail');
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lab-registry-'));
    writeFileSync(join(dir, TESTS_FILE), bundledTests);
    writeFileSync(join(dir, CONVERSIONS_FILE), JSON.stringify({ conversions: {} }));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a directory without conversions', () => {
    const registry = loadRegistry(dir);
    expect(registry.codes()).toHaveLength(15);
    expect(registry.conversionsFor('FBG')).toBeUndefined();
  });

  it('reports a missing template with its path', () => {
    const data = JSON.parse(bundledTests);
    delete data.tests[0].templates.normal;
    writeFileSync(join(dir, TESTS_FILE), JSON.stringify(data));
    expect(problems()).toContain('lab-tests.json: tests.0.templates.normal: Required');
  });

  it('reports an unknown conversion kind', () => {
    writeFileSync(
      join(dir, CONVERSIONS_FILE),
      JSON.stringify({ conversions: { FBG: { 'mmol/L': { factor: 18, kind: 'formula' } } } })
    );
    const [problem] = problems();
    expect(problem).toMatch(/^unit-conversions\.json: conversions\.FBG\.mmol\/L\.kind: /);
  });

  it('reports invariant violations found after parsing', () => {
    const data = JSON.parse(bundledTests);
    data.tests[4].borderlineRange = { low: 90, high: 125 };
    writeFileSync(join(dir, TESTS_FILE), JSON.stringify(data));
    expect(problems()).toEqual(['FBG: borderline range starts at 90, inside the default reference range (high 99)']);
  });

  it('reports unreadable JSON', () => {
    writeFileSync(join(dir, TESTS_FILE), '{ not json');
    const [problem] = problems();
    expect(problem?.startsWith(join(dir, TESTS_FILE))).toBe(true);
  });
});
