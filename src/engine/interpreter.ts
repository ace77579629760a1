// src/engine/interpreter.ts
import { convertUnit } from '../registry/conversions.js';
import type { LabRegistry } from '../registry/registry.js';
import { checkCritical, classifySeverity, classifyStatus, resolveReferenceRange } from './classify.js';
import { assertFiniteValue, InvalidInputError, PediatricNotSupportedError, UnknownTestError } from './errors.js';
import { selectExplanation } from './explanations.js';
import { formatReferenceRange } from './format.js';
import { summarize } from './summary.js';
import type { Interpretation, PatientSex, Summary } from './types.js';

export const DEFAULT_MIN_PATIENT_AGE = 18;

export type EngineOptions = {
  minPatientAge?: number;
};

export interface InterpretationEngine {
  readonly minPatientAge: number;
  /** @throws InvalidInputError | PediatricNotSupportedError */
  assertSupportedAge(age: number): void;
  /** @throws InvalidInputError | PediatricNotSupportedError | UnknownTestError */
  interpret(testCode: string, value: number, sex: PatientSex, age: number): Interpretation;
  /** @throws InvalidInputError | UnsupportedConversionError */
  convertUnit(testCode: string, value: number, fromUnit: string, toUnit: string): number;
  summarize(interpretations: readonly Interpretation[]): Summary;
}

/**
 * Deterministic, rules-based interpreter over an injected registry. Holds no
 * state besides the registry, so one instance can serve any number of
 * concurrent requests.
 */
export function createInterpretationEngine(registry: LabRegistry, options: EngineOptions = {}): InterpretationEngine {
  const minPatientAge = options.minPatientAge ?? DEFAULT_MIN_PATIENT_AGE;

  function assertSupportedAge(age: number): void {
    if (!Number.isInteger(age)) throw new InvalidInputError(`Patient age must be a whole number of years, got ${age}`);
    if (age < minPatientAge) throw new PediatricNotSupportedError(minPatientAge);
  }

  return {
    minPatientAge,
    assertSupportedAge,

    interpret(testCode, value, sex, age) {
      assertSupportedAge(age);
      assertFiniteValue(value, `${testCode} value`);

      const definition = registry.get(testCode);
      if (!definition) throw new UnknownTestError(testCode);

      const range = resolveReferenceRange(definition, sex);
      const critical = checkCritical(value, definition.criticalThresholds);
      const status = classifyStatus(value, range);
      const severity = classifySeverity(value, range, definition.borderlineRange, critical.critical);
      const text = selectExplanation(definition, status, severity, critical);

      return Object.freeze({
        testCode: definition.code,
        testName: definition.name,
        value,
        unit: definition.unit,
        status,
        severity,
        referenceRange: formatReferenceRange(range, definition.unit),
        explanation: text.explanation,
        whyItMatters: text.whyItMatters,
        nextSteps: text.nextSteps,
      });
    },

    convertUnit: (testCode, value, fromUnit, toUnit) => convertUnit(registry, testCode, value, fromUnit, toUnit),

    summarize: interpretations => summarize(interpretations),
  };
}
