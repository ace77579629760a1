// src/batch.ts
import type { Logger } from 'pino';
import type { Interpretation, InterpretationEngine, PatientSex, Summary } from './engine/index.js';
import type { LabRegistry } from './registry/index.js';

export const MEDICAL_DISCLAIMER =
  'This information is for educational purposes only and does not replace ' +
  'professional medical advice, diagnosis, or treatment. Always consult a ' +
  'qualified healthcare provider with questions about your health or lab results.';

export type LabResultInput = {
  testCode: string;
  value: number;
  unit: string;
};

export type BatchRequest = {
  patient: { age: number; sex: PatientSex };
  results: LabResultInput[];
};

export type BatchResult = {
  summary: Summary;
  interpretations: Interpretation[];
  warnings?: { unsupportedTests: string[] };
  disclaimer: string;
};

/**
 * Interprets every supported result of a request. Unknown test codes become
 * warnings; an unconvertible unit or an under-age patient fails the whole
 * batch, and no partial output is returned.
 */
export function interpretBatch(
  engine: InterpretationEngine,
  registry: LabRegistry,
  request: BatchRequest,
  log?: Logger
): BatchResult {
  const { age, sex } = request.patient;
  engine.assertSupportedAge(age);

  const interpretations: Interpretation[] = [];
  const unsupportedTests: string[] = [];

  for (const result of request.results) {
    const testCode = result.testCode.trim().toUpperCase();
    const definition = registry.get(testCode);
    if (!definition) {
      unsupportedTests.push(testCode);
      log?.warn({ testCode }, 'unsupported test code');
      continue;
    }

    let value = result.value;
    if (result.unit !== definition.unit) {
      value = engine.convertUnit(testCode, result.value, result.unit, definition.unit);
      log?.debug({ testCode, fromUnit: result.unit, toUnit: definition.unit }, 'unit converted');
    }

    const interpretation = engine.interpret(testCode, value, sex, age);
    if (interpretation.severity === 'CRITICAL') {
      log?.warn({ testCode, status: interpretation.status }, 'critical result');
    }
    interpretations.push(interpretation);
  }

  return {
    summary: engine.summarize(interpretations),
    interpretations,
    ...(unsupportedTests.length ? { warnings: { unsupportedTests } } : {}),
    disclaimer: MEDICAL_DISCLAIMER,
  };
}
