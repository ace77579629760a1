// src/registry/index.ts
export { createRegistry, type LabRegistry } from './registry.js';
export { applyConversion, convertUnit, HBA1C_PERCENT_OFFSET } from './conversions.js';
export { loadRegistry, DEFAULT_DATA_DIR, TESTS_FILE, CONVERSIONS_FILE } from './load.js';
