// src/engine/explanations.ts
import { RegistryConfigError } from './errors.js';
import type { CriticalCheck, ExplanationTemplate, Severity, Status, TemplateKey, TestDefinition } from './types.js';

/**
 * Shown for every CRITICAL result in place of the test's own templates, so
 * that urgent results always carry the same action-first wording.
 */
export const CRITICAL_MESSAGE: Readonly<ExplanationTemplate> = Object.freeze({
  explanation: 'This result is outside the safe range and requires immediate medical attention.',
  whyItMatters: 'Values at this level may indicate a serious medical condition.',
  nextSteps:
    'Seek urgent medical attention immediately. Contact your healthcare provider or go to the nearest emergency facility.',
});

export function selectTemplateKey(status: Status, severity: Severity, critical: CriticalCheck): TemplateKey {
  switch (severity) {
    case 'CRITICAL':
      return critical.critical && critical.direction === 'low' ? 'critical_low' : 'critical_high';
    case 'BORDERLINE':
      return 'borderline';
    case 'ABNORMAL':
    case 'NORMAL':
      return status === 'LOW' ? 'low' : status === 'HIGH' ? 'high' : 'normal';
  }
}

export function selectExplanation(
  definition: TestDefinition,
  status: Status,
  severity: Severity,
  critical: CriticalCheck
): ExplanationTemplate {
  if (severity === 'CRITICAL') return CRITICAL_MESSAGE;

  const key = selectTemplateKey(status, severity, critical);
  const template = definition.templates[key];
  if (!template) {
    throw new RegistryConfigError([`${definition.code}: missing "${key}" template`]);
  }
  return template;
}
