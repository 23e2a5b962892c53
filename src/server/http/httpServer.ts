import type { Server } from 'node:http';
import { logger } from '../../logging/logging.js';
import { createApp } from '../server.js';
import { HTTP_SERVER_CONFIG } from './config.js';

/**
 * Starts the config-generation HTTP server on the specified port.
 */
export const startHttpServer = (port: number, host: string = HTTP_SERVER_CONFIG.defaultHost) => {
  const app = createApp();

  const server: Server = app.listen(port, host, () => {
    const addr = server.address();
    const boundPort = addr !== null && typeof addr === 'object' ? addr.port : port;
    logger.info({ host, port: boundPort }, 'Terragrunt config API listening');
  });

  // Configure server timeouts for stability
  server.timeout = HTTP_SERVER_CONFIG.timeout;
  server.keepAliveTimeout = HTTP_SERVER_CONFIG.keepAliveTimeout;
  server.headersTimeout = HTTP_SERVER_CONFIG.headersTimeout;

  server.on('error', (error: Error) => {
    logger.error({ err: error }, 'Server error');
  });

  const gracefulShutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down HTTP server');
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  const onSigterm = () => gracefulShutdown('SIGTERM');
  const onSigint = () => gracefulShutdown('SIGINT');
  process.on('SIGTERM', onSigterm);
  process.on('SIGINT', onSigint);

  server.on('close', () => {
    process.off('SIGTERM', onSigterm);
    process.off('SIGINT', onSigint);
  });

  return server;
};
