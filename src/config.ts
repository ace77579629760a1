// src/config.ts
import type { LevelWithSilent } from 'pino';
import { DEFAULT_MIN_PATIENT_AGE } from './engine/index.js';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type AppConfig = {
  port: number;
  host: string;
  logLevel: LevelWithSilent;
  minPatientAge: number;
  corsOrigins: string[];
  jsonLimit: string;
  dataDir?: string;
};

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return n;
}

function isLogLevel(s: string): s is LevelWithSilent {
  return LOG_LEVELS.some(l => l === s);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`);
  }

  return {
    port: intFromEnv(env, 'PORT', 8000, 0, 65535),
    host: env.HOST?.trim() || '0.0.0.0',
    logLevel,
    minPatientAge: intFromEnv(env, 'MIN_PATIENT_AGE', DEFAULT_MIN_PATIENT_AGE, 0, 120),
    corsOrigins: (env.CORS_ORIGIN ?? '').split(',').map(s => s.trim()).filter(Boolean),
    jsonLimit: env.JSON_LIMIT?.trim() || '1mb',
    dataDir: env.LAB_DATA_DIR?.trim() || undefined,
  };
}
