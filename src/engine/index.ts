// src/engine/index.ts
export * from './types.js';
export * from './errors.js';
export { checkCritical, classifySeverity, classifyStatus, resolveReferenceRange } from './classify.js';
export { CRITICAL_MESSAGE, selectExplanation, selectTemplateKey } from './explanations.js';
export { formatReferenceRange } from './format.js';
export { summarize } from './summary.js';
export {
  createInterpretationEngine,
  DEFAULT_MIN_PATIENT_AGE,
  type EngineOptions,
  type InterpretationEngine,
} from './interpreter.js';
