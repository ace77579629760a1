// src/test-utils.ts
// Synthetic test definitions shared by the unit tests.
import type { ExplanationTemplate, ExplanationTemplates, TestDefinition } from './engine/index.js';

export function template(label: string): ExplanationTemplate {
  return { explanation: `${label} explanation`, whyItMatters: `${label} why`, nextSteps: `${label} next` };
}

export function templates(withBorderline: boolean): ExplanationTemplates {
  return {
    low: template('low'),
    normal: template('normal'),
    high: template('high'),
    ...(withBorderline ? { borderline: template('borderline') } : {}),
    critical_low: template('critical_low'),
    critical_high: template('critical_high'),
  };
}

export function glucoseLike(): Extract<TestDefinition, { sexSpecific: false }> {
  return {
    code: 'GLU',
    name: 'Glucose',
    category: 'Metabolic',
    unit: 'mg/dL',
    sexSpecific: false,
    referenceRanges: { default: { low: 70, high: 99 } },
    borderlineRange: { low: 100, high: 125 },
    criticalThresholds: { low: 54, high: 400 },
    templates: templates(true),
  };
}

export function hemoglobinLike(): TestDefinition {
  return {
    code: 'HGB',
    name: 'Hemoglobin',
    category: 'Hematology',
    unit: 'g/dL',
    sexSpecific: true,
    referenceRanges: { male: { low: 13.5, high: 17.5 }, female: { low: 12, high: 15.5 } },
    criticalThresholds: { low: 7, high: 20 },
    templates: templates(false),
  };
}
