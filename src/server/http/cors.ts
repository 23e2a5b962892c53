import type express from 'express';
import { logger } from '../../logging/logging.js';

/**
 * CORS configuration for the config-generation API.
 * - strict: Only allows explicitly configured origins
 * - development: Allows localhost + explicitly configured origins
 * - disabled: Allows all origins
 */
export interface CORSConfig {
  mode: CORSMode;
  allowedOrigins: string[];
}

export type CORSMode = 'strict' | 'development' | 'disabled';

const CORS_MODES: readonly CORSMode[] = ['strict', 'development', 'disabled'];

const LOCALHOST_PATTERN = /^https?:\/\/(localhost|127\.0\.0\.1|\[::1\])(:\d+)?$/;

/**
 * Loads CORS configuration from TG_API_CORS_MODE and TG_API_ALLOWED_ORIGINS.
 */
export function loadCORSConfig(env: NodeJS.ProcessEnv = process.env): CORSConfig {
  const givenMode = (env.TG_API_CORS_MODE || 'strict').toLowerCase();
  const mode = CORS_MODES.find((candidate) => candidate === givenMode);

  if (!mode) {
    logger.warn({ mode: givenMode }, "Invalid CORS mode. Defaulting to 'strict'.");
  }

  return {
    mode: mode ?? 'strict',
    allowedOrigins: parseCommaSeparatedEnv(env.TG_API_ALLOWED_ORIGINS)
  };
}

export function setCORSHeaders(res: express.Response, origin?: string): void {
  res.header('Access-Control-Max-Age', '3600');
  res.header('Access-Control-Allow-Origin', origin || '*');
  res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
}

/**
 * In development mode, localhost origins are allowed in addition to the allowlist.
 */
export function isOriginAllowed(origin: string, config: CORSConfig): boolean {
  if (config.allowedOrigins.includes(origin)) return true;
  return config.mode === 'development' && LOCALHOST_PATTERN.test(origin);
}

/**
 * Creates Express middleware for CORS validation and header setting.
 * Requests without an Origin header (same-origin, curl) are passed through.
 */
export function createCORSMiddleware(config: CORSConfig): express.RequestHandler {
  return (req, res, next) => {
    const origin = req.headers.origin;

    if (config.mode === 'disabled') {
      setCORSHeaders(res);
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      return next();
    }

    if (!origin) {
      return next();
    }

    if (!isOriginAllowed(origin, config)) {
      res.status(403).json({ error: 'Origin not allowed' });
      return;
    }

    setCORSHeaders(res, origin);

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}

function parseCommaSeparatedEnv(envValue: string | undefined): string[] {
  return (
    envValue
      ?.split(',')
      .map((item) => item.trim())
      .filter(Boolean) || []
  );
}
