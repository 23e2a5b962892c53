#!/usr/bin/env node
import { cmd } from './cmd/cmd.js';
import { logger } from './logging/logging.js';

cmd().catch((error: unknown) => {
  logger.error({ err: error }, 'Command failed');
  process.exit(1);
});
