// src/engine/summary.ts
import { SEVERITIES, type Interpretation, type Severity, type Summary } from './types.js';

/**
 * Rolls a batch up to its most urgent severity. An empty batch reports
 * NORMAL with evaluatedCount 0.
 */
export function summarize(interpretations: readonly Pick<Interpretation, 'severity'>[]): Summary {
  const counts: Record<Severity, number> = { CRITICAL: 0, ABNORMAL: 0, BORDERLINE: 0, NORMAL: 0 };
  for (const i of interpretations) counts[i.severity]++;

  const overallFlag = SEVERITIES.find(s => counts[s] > 0) ?? 'NORMAL';

  return {
    overallFlag,
    criticalAlert: counts.CRITICAL > 0,
    criticalCount: counts.CRITICAL,
    abnormalCount: counts.ABNORMAL,
    borderlineCount: counts.BORDERLINE,
    normalCount: counts.NORMAL,
    evaluatedCount: interpretations.length,
  };
}
