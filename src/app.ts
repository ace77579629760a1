// src/app.ts
import express from 'express';
import cors from 'cors';
import createError from 'http-errors';
import { pinoHttp } from 'pino-http';
import type { Logger } from 'pino';
import { interpretBatch } from './batch.js';
import { isLabEngineError, type InterpretationEngine } from './engine/index.js';
import { SERVICE_NAME } from './logger.js';
import type { LabRegistry } from './registry/index.js';
import { interpretRequestSchema, toBatchRequest } from './schemas.js';
import { toWireListing, toWireResponse } from './wire.js';

export const APP_VERSION = '1.0.0';
export const INTERNAL_ERROR_MESSAGE = 'An error occurred processing your request. Please try again.';

export type AppDeps = {
  engine: InterpretationEngine;
  registry: LabRegistry;
  logger: Logger;
  corsOrigins?: string[];
  jsonLimit?: string;
};

function toHttpError(err: unknown): createError.HttpError {
  if (createError.isHttpError(err)) return err;
  if (isLabEngineError(err)) {
    switch (err.kind) {
      case 'pediatric_not_supported':
      case 'unsupported_conversion':
      case 'unknown_test':
      case 'invalid_input':
        return createError(400, err.message, { code: err.kind });
      case 'registry_config':
        return createError(500, INTERNAL_ERROR_MESSAGE, { code: 'internal_error' });
    }
  }
  return createError(500, INTERNAL_ERROR_MESSAGE, { code: 'internal_error' });
}

function errorCode(err: createError.HttpError): string {
  if (typeof err.code === 'string') return err.code;
  if (err.status >= 500) return 'internal_error';
  return err.status === 404 ? 'not_found' : 'bad_request';
}

export function createApp({ engine, registry, logger, corsOrigins = [], jsonLimit = '1mb' }: AppDeps) {
  const app = express();
  app.disable('x-powered-by');
  app.use(pinoHttp({
    logger,
    customLogLevel: (_req, res, err) => (err || res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info'),
  }));
  app.use(cors({ origin: corsOrigins.length ? corsOrigins : true }));
  app.use(express.json({ limit: jsonLimit }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, service: SERVICE_NAME, version: APP_VERSION, tests_loaded: registry.codes().length });
  });

  app.get('/tests', (_req, res) => {
    const tests = registry.list().map(toWireListing);
    res.json({ supported_tests: tests, count: tests.length });
  });

  app.post('/interpret', (req, res, next) => {
    try {
      const parsed = interpretRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw createError(400, 'Invalid request body', {
          code: 'bad_request',
          details: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
        });
      }
      const out = interpretBatch(engine, registry, toBatchRequest(parsed.data), req.log);
      res.json(toWireResponse(out));
    } catch (e) { next(e); }
  });

  app.use((_req, _res, next) => next(createError(404, 'Route not found', { code: 'not_found' })));

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const httpErr = toHttpError(err);
    if (httpErr.status >= 500) req.log.error({ err }, 'request failed');
    else req.log.info({ code: errorCode(httpErr) }, httpErr.message);

    res.status(httpErr.status).json({
      error: errorCode(httpErr),
      message: httpErr.expose ? httpErr.message : INTERNAL_ERROR_MESSAGE,
      ...(httpErr.expose && Array.isArray(httpErr.details) ? { details: httpErr.details } : {}),
    });
  });

  return app;
}
