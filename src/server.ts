/**
 * Express HTTP server setup with security middleware and the route table
 */

import express, { type Request, type Response, type NextFunction } from 'express';
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

/**
 * Create and configure Express application
 * Exports app for testing without starting the server
 */
export function createApp(
  config: AppConfig,
  options: ServerOptions = {}
): express.Application {
  const app = express();
  const routes = options.routes ?? ROUTES;

  // No ETag header, same as the native server
  app.set('etag', false);

  // Security middleware (adds various HTTP headers)
  app.use(helmet());

  if (config.logRequests) {
    app.use(createRequestLogger(options.logSink));
  }

  /**
   * Route table dispatch
   * One middleware instead of app.get(): only GET and HEAD reach a route,
   * OPTIONS is not answered automatically.
   */
  app.use((req: Request, res: Response, next: NextFunction) => {
    const route = findRoute(routes, req.method, requestPath(req.url));

    if (!route) {
      next();
      return;
    }

    sendResponse(res, route.respond());
  });

  /**
   * 404 handler for unknown routes and unsupported methods
   */
  app.use((_req: Request, res: Response) => {
    sendResponse(res, notFoundResponse());
  });

  /**
   * Global error handler
   * Never leaks stack traces; the message is only included in debug mode
   */
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    console.error('Unexpected error:', err);

    if (res.headersSent) {
      next(err);
      return;
    }

    sendResponse(res, internalErrorResponse(err, config.debug));
  });

  return app;
}

function sendResponse(res: Response, response: RouteResponse): void {
  res.status(response.status).type(response.contentType).send(response.body);
}
