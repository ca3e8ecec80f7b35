/**
 * HTTP server on node:http primitives
 * Answers exactly like the Express application: same route table, headers and bodies
 */

import http, { type RequestListener, type Server, type ServerResponse } from 'node:http';
import helmet from 'helmet';
import { createRequestLogger } from './requestLogger.js';
import {
  ROUTES,
  findRoute,
  internalErrorResponse,
  notFoundResponse,
  requestPath,
} from './routes.js';
import type { AppConfig, RouteResponse, ServerOptions } from './types.js';

function writeResponse(res: ServerResponse, response: RouteResponse): void {
  res.writeHead(response.status, {
    'Content-Type': response.contentType,
    'Content-Length': Buffer.byteLength(response.body),
  });
  res.end(response.body);
}

/**
 * Build the request listener
 * Order: request logging, security headers, route dispatch
 */
export function createRequestListener(
  config: AppConfig,
  options: ServerOptions = {}
): RequestListener {
  const routes = options.routes ?? ROUTES;
  const secureHeaders = helmet();
  const logRequest = config.logRequests ? createRequestLogger(options.logSink) : undefined;

  const fail = (res: ServerResponse, error: unknown): void => {
    console.error('Unexpected error:', error);

    // Too late for a 500: drop the connection
    if (res.headersSent) {
      res.destroy();
      return;
    }

    writeResponse(res, internalErrorResponse(error, config.debug));
  };

  return (req, res) => {
    const dispatch = (): void => {
      try {
        const route = findRoute(routes, req.method, requestPath(req.url));
        writeResponse(res, route ? route.respond() : notFoundResponse());
      } catch (error) {
        fail(res, error);
      }
    };

    const handle = (): void => {
      secureHeaders(req, res, (error?: unknown) => {
        if (error) {
          fail(res, error);
          return;
        }

        dispatch();
      });
    };

    if (logRequest) {
      logRequest(req, res, handle);
    } else {
      handle();
    }
  };
}

/**
 * Create (but do not start) the native HTTP server
 */
export function createNativeServer(config: AppConfig, options: ServerOptions = {}): Server {
  return http.createServer(createRequestListener(config, options));
}
