import express from 'express';
import { logger } from '../logging/logging.js';
import { HTTP_SERVER_CONFIG, SERVICE_NAME } from './http/config.js';
import { createCORSMiddleware, loadCORSConfig, type CORSConfig } from './http/cors.js';
import { ConfigCreationRouter, type HclGenerator } from './http/router.js';

export interface AppOptions {
  cors?: CORSConfig;
  /** Replaces the converter, e.g. to simulate encoder failures in tests */
  generate?: HclGenerator;
}

/**
 * Builds the Express application without binding a port.
 */
export const createApp = (options: AppOptions = {}): express.Express => {
  const app = express();
  app.use(express.json({ limit: HTTP_SERVER_CONFIG.bodyLimit }));

  // Probes answer unconditionally; there are no external dependencies to check.
  app.get('/', (_req, res) => {
    res.json({ service: SERVICE_NAME, status: 'ok' });
  });
  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.get('/readyz', (_req, res) => {
    res.json({ status: 'ready' });
  });

  app.use(HTTP_SERVER_CONFIG.apiPrefix, createCORSMiddleware(options.cors ?? loadCORSConfig()));
  app.use(new ConfigCreationRouter(options.generate).createRouter());

  app.use(handleBodyErrors);

  return app;
};

/**
 * Turns body-parser failures (invalid JSON, oversized payloads) into client errors.
 */
const handleBodyErrors: express.ErrorRequestHandler = (error: unknown, _req, res, next) => {
  const status = clientErrorStatus(error);
  if (status === undefined) {
    logger.error({ err: error }, 'Unhandled request error');
    if (res.headersSent) return next(error);
    res.status(500).json({ error: 'Internal server error' });
    return;
  }

  const message = status === 413 ? 'Request body too large' : 'Malformed JSON body';
  logger.warn({ status }, message);
  res.status(status).json({ error: message });
};

function clientErrorStatus(error: unknown): number | undefined {
  if (error === null || typeof error !== 'object' || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
