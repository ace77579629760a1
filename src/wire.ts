// src/wire.ts
// snake_case response shapes for the HTTP API.
import type { BatchResult } from './batch.js';
import type { Interpretation, Severity, Status, Summary, TestListing } from './engine/index.js';

export type WireInterpretation = {
  test_code: string;
  test_name: string;
  value: number;
  unit: string;
  status: Status;
  severity: Severity;
  reference_range: string;
  explanation: string;
  why_it_matters: string;
  next_steps: string;
};

export type WireSummary = {
  overall_flag: Severity;
  critical_alert: boolean;
  critical_count: number;
  abnormal_count: number;
  borderline_count: number;
  normal_count: number;
  evaluated_count: number;
};

export type WireInterpretResponse = {
  summary: WireSummary;
  interpretations: WireInterpretation[];
  warnings?: { unsupported_tests: string[] };
  disclaimer: string;
};

export type WireTestListing = {
  code: string;
  name: string;
  category: string;
  unit: string;
  sex_specific: boolean;
  alternate_units: string[];
};

export function toWireInterpretation(i: Interpretation): WireInterpretation {
  return {
    test_code: i.testCode,
    test_name: i.testName,
    value: i.value,
    unit: i.unit,
    status: i.status,
    severity: i.severity,
    reference_range: i.referenceRange,
    explanation: i.explanation,
    why_it_matters: i.whyItMatters,
    next_steps: i.nextSteps,
  };
}

export function toWireSummary(s: Summary): WireSummary {
  return {
    overall_flag: s.overallFlag,
    critical_alert: s.criticalAlert,
    critical_count: s.criticalCount,
    abnormal_count: s.abnormalCount,
    borderline_count: s.borderlineCount,
    normal_count: s.normalCount,
    evaluated_count: s.evaluatedCount,
  };
}

export function toWireResponse(r: BatchResult): WireInterpretResponse {
  return {
    summary: toWireSummary(r.summary),
    interpretations: r.interpretations.map(toWireInterpretation),
    ...(r.warnings ? { warnings: { unsupported_tests: r.warnings.unsupportedTests } } : {}),
    disclaimer: r.disclaimer,
  };
}

export function toWireListing(t: TestListing): WireTestListing {
  return {
    code: t.code,
    name: t.name,
    category: t.category,
    unit: t.unit,
    sex_specific: t.sexSpecific,
    alternate_units: t.alternateUnits,
  };
}
