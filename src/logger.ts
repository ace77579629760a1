// src/logger.ts
import { pino, type LevelWithSilent, type Logger } from 'pino';

export const SERVICE_NAME = 'lab-interpretation-service';

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    redact: ['req.headers.authorization', 'req.headers.cookie'],
  });
}
