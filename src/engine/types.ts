// src/engine/types.ts

export const STATUSES = ['LOW', 'NORMAL', 'HIGH'] as const;
export type Status = (typeof STATUSES)[number];

// Ordered from most to least urgent; the summarizer relies on this order.
export const SEVERITIES = ['CRITICAL', 'ABNORMAL', 'BORDERLINE', 'NORMAL'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type PatientSex = 'male' | 'female';

export type NumericRange = {
  low: number;
  high: number;
};

export type CriticalThresholds = {
  low?: number;
  high?: number;
};

export type CriticalCheck =
  | { critical: false }
  | { critical: true; direction: 'low' | 'high' };

export type ExplanationTemplate = {
  explanation: string;
  whyItMatters: string;
  nextSteps: string;
};

export type TemplateKey = 'low' | 'normal' | 'high' | 'borderline' | 'critical_low' | 'critical_high';

export type ExplanationTemplates = Record<Exclude<TemplateKey, 'borderline'>, ExplanationTemplate> & {
  borderline?: ExplanationTemplate;
};

type TestDefinitionBase = {
  code: string;
  name: string;
  category: string;
  unit: string;
  borderlineRange?: NumericRange;
  criticalThresholds: CriticalThresholds;
  templates: ExplanationTemplates;
};

export type TestDefinition = TestDefinitionBase &
  (
    | { sexSpecific: true; referenceRanges: { male: NumericRange; female: NumericRange } }
    | { sexSpecific: false; referenceRanges: { default: NumericRange } }
  );

export type ConversionKind = 'multiply' | 'mmolPerMolToPercent';

export type UnitConversion = {
  factor: number;
  kind: ConversionKind;
};

/** test code -> alternate unit -> conversion into the test's primary unit */
export type ConversionTable = Record<string, Record<string, UnitConversion>>;

export type TestListing = {
  code: string;
  name: string;
  category: string;
  unit: string;
  sexSpecific: boolean;
  alternateUnits: string[];
};

export type Interpretation = {
  testCode: string;
  testName: string;
  value: number;
  unit: string;
  status: Status;
  severity: Severity;
  referenceRange: string;
  explanation: string;
  whyItMatters: string;
  nextSteps: string;
};

export type Summary = {
  overallFlag: Severity;
  criticalAlert: boolean;
  criticalCount: number;
  abnormalCount: number;
  borderlineCount: number;
  normalCount: number;
  evaluatedCount: number;
};
