import { expect } from 'chai';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { logger } from '../src/logging/logging.js';
import { startHttpServer } from '../src/server/http/httpServer.js';

describe('startHttpServer', () => {
  const originalInfo = logger.info;
  let infoCalls: unknown[][];
  let server: Server | undefined;

  beforeEach(() => {
    infoCalls = [];
    logger.info = (...args: unknown[]) => {
      infoCalls.push(args);
    };
  });

  afterEach(async () => {
    logger.info = originalInfo;
    if (server?.listening) {
      await new Promise<void>((resolve) => server?.close(() => resolve()));
    }
    server = undefined;
  });

  it('should log the bound address as structured fields', async () => {
    server = startHttpServer(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address !== 'object') {
      throw new Error('expected a bound TCP address');
    }
    expect(infoCalls).to.deep.equal([
      [{ host: '127.0.0.1', port: address.port }, 'Terragrunt config API listening']
    ]);
  });

  it('should release its signal handlers once closed', async () => {
    const sigterm = process.listenerCount('SIGTERM');
    const sigint = process.listenerCount('SIGINT');

    server = startHttpServer(0, '127.0.0.1');
    await once(server, 'listening');
    expect(process.listenerCount('SIGTERM')).to.equal(sigterm + 1);

    await new Promise<void>((resolve) => server?.close(() => resolve()));

    expect(process.listenerCount('SIGTERM')).to.equal(sigterm);
    expect(process.listenerCount('SIGINT')).to.equal(sigint);
  });
});
