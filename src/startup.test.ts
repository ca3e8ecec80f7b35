/**
 * Tests for binding the configured server
 */

import type { Server } from 'node:http';
import { describe, it, expect, afterEach } from 'vitest';
import request from 'supertest';
import { ServerStartError, startServer } from './startup.js';
import type { AppConfig } from './types.js';

const testConfig: AppConfig = {
  host: '127.0.0.1',
  port: 0,
  debug: false,
  logRequests: false,
  serverMode: 'framework',
};

function boundAddress(server: Server): { address: string; port: number } {
  const address = server.address();

  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }

  return { address: address.address, port: address.port };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('startServer', () => {
  const started: Server[] = [];

  afterEach(async () => {
    await Promise.all(started.splice(0).map(closeServer));
  });

  it.each(['framework', 'native'] as const)(
    'should bind the configured host in %s mode and answer /hello',
    async (serverMode) => {
      const server = await startServer({ ...testConfig, serverMode });
      started.push(server);

      expect(server.listening).toBe(true);
      expect(boundAddress(server).address).toBe('127.0.0.1');

      const response = await request(server).get('/hello');
      expect(response.status).toBe(200);
      expect(response.text).toBe('Hello world');
    }
  );

  it('should bind the configured port', async () => {
    const probe = await startServer(testConfig);
    const { port } = boundAddress(probe);
    await closeServer(probe);

    const server = await startServer({ ...testConfig, port });
    started.push(server);

    expect(boundAddress(server).port).toBe(port);
  });

  it.each(['framework', 'native'] as const)(
    'should fail fast when the port is already bound (%s)',
    async (serverMode) => {
      const blocker = await startServer(testConfig);
      started.push(blocker);
      const { port } = boundAddress(blocker);

      const attempt = startServer({ ...testConfig, port, serverMode });

      await expect(attempt).rejects.toBeInstanceOf(ServerStartError);
      await expect(attempt).rejects.toMatchObject({
        message: `Unable to start server on 127.0.0.1:${port} (EADDRINUSE)`,
        host: '127.0.0.1',
        port,
        code: 'EADDRINUSE',
      });
    }
  );
});

describe('ServerStartError', () => {
  it('should fall back to the cause message when there is no error code', () => {
    const cause = new Error('bind refused');
    const error = new ServerStartError('localhost', 3000, cause);

    expect(error.message).toBe('Unable to start server on localhost:3000 (bind refused)');
    expect(error.code).toBeUndefined();
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('ServerStartError');
  });
});
