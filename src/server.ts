// src/server.ts
import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { createInterpretationEngine } from './engine/index.js';
import { createLogger } from './logger.js';
import { loadRegistry } from './registry/index.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);
const registry = loadRegistry(config.dataDir);
const engine = createInterpretationEngine(registry, { minPatientAge: config.minPatientAge });

const app = createApp({ engine, registry, logger, corsOrigins: config.corsOrigins, jsonLimit: config.jsonLimit });

app.listen(config.port, config.host, () => {
  logger.info({ port: config.port, tests: registry.codes().length }, 'lab interpretation service listening');
});
