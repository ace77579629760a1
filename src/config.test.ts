import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('has expected default values', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      logLevel: 'info',
      minPatientAge: 18,
      corsOrigins: [],
      jsonLimit: '1mb',
      dataDir: undefined,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '3000',
      LOG_LEVEL: 'DEBUG',
      MIN_PATIENT_AGE: '21',
      CORS_ORIGIN: 'http://a.test, http://b.test,',
      LAB_DATA_DIR: '/srv/lab-data',
    });
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('debug');
    expect(config.minPatientAge).toBe(21);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.dataDir).toBe('/srv/lab-data');
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be an integer between 0 and 65535, got "abc"');
    expect(() => loadConfig({ MIN_PATIENT_AGE: '17.5' })).toThrow('MIN_PATIENT_AGE must be an integer');
  });

  it('rejects unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL must be one of');
  });
});
