/**
 * Server bootstrap: build the configured implementation and bind it
 */

import http, { type Server } from 'node:http';
import { createNativeServer } from './nativeServer.js';
import { createApp } from './server.js';
import type { AppConfig, ServerOptions } from './types.js';

/**
 * Raised when the listening socket cannot be bound
 */
export class ServerStartError extends Error {
  readonly host: string;
  readonly port: number;
  readonly code: string | undefined;

  constructor(host: string, port: number, cause: Error) {
    const code = errorCode(cause);
    super(`Unable to start server on ${host}:${port} (${code ?? cause.message})`, { cause });
    this.name = 'ServerStartError';
    this.host = host;
    this.port = port;
    this.code = code;
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Create the server for the configured mode without binding it
 */
export function createServer(config: AppConfig, options: ServerOptions = {}): Server {
  if (config.serverMode === 'native') {
    return createNativeServer(config, options);
  }

  return http.createServer(createApp(config, options));
}

/**
 * Bind the server on config.host:config.port
 * Resolves once listening; rejects with ServerStartError if the bind fails
 */
export function startServer(config: AppConfig, options: ServerOptions = {}): Promise<Server> {
  const server = createServer(config, options);

  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(new ServerStartError(config.host, config.port, error));
    };

    const onListening = (): void => {
      server.off('error', onError);
      resolve(server);
    };

    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(config.port, config.host);
  });
}
