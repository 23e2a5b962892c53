import pino from 'pino';

/**
 * Shared application logger.
 * Writes JSON lines to stderr so that `generate --stdout` output stays clean on stdout.
 */
export const logger = pino(
  {
    name: 'terragrunt-config-api',
    level: process.env.LOG_LEVEL || 'info'
  },
  pino.destination(2)
);
