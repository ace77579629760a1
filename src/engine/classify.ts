// src/engine/classify.ts
import type { CriticalCheck, CriticalThresholds, NumericRange, PatientSex, Severity, Status, TestDefinition } from './types.js';

export function resolveReferenceRange(definition: TestDefinition, sex: PatientSex): NumericRange {
  return definition.sexSpecific ? definition.referenceRanges[sex] : definition.referenceRanges.default;
}

/** Both bounds of the reference range count as NORMAL. */
export function classifyStatus(value: number, range: NumericRange): Status {
  if (value < range.low) return 'LOW';
  if (value <= range.high) return 'NORMAL';
  return 'HIGH';
}

// Equality with a threshold is critical. Low is checked first.
export function checkCritical(value: number, thresholds: CriticalThresholds): CriticalCheck {
  if (thresholds.low !== undefined && value <= thresholds.low) return { critical: true, direction: 'low' };
  if (thresholds.high !== undefined && value >= thresholds.high) return { critical: true, direction: 'high' };
  return { critical: false };
}

/**
 * Severity in strict priority order: CRITICAL, then BORDERLINE (only above
 * the reference range and inside the borderline band), then ABNORMAL, then
 * NORMAL. A critical result can never be reported as borderline.
 */
export function classifySeverity(
  value: number,
  range: NumericRange,
  borderline: NumericRange | undefined,
  critical: boolean
): Severity {
  if (critical) return 'CRITICAL';
  if (borderline && value > range.high && value >= borderline.low && value <= borderline.high) {
    return 'BORDERLINE';
  }
  if (value < range.low || value > range.high) return 'ABNORMAL';
  return 'NORMAL';
}
