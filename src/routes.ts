/**
 * Route table and response generation shared by both server implementations
 * Pure functions: every call builds a new response, nothing is kept between requests
 */

import type { Route, RouteResponse } from './types.js';

const TEXT_PLAIN = 'text/plain; charset=utf-8';
const APPLICATION_JSON = 'application/json; charset=utf-8';

function jsonResponse(status: number, payload: Record<string, string>): RouteResponse {
  return { status, contentType: APPLICATION_JSON, body: JSON.stringify(payload) };
}

/**
 * Routes served by the application
 */
export const ROUTES: readonly Route[] = [
  {
    method: 'GET',
    path: '/hello',
    respond: () => ({ status: 200, contentType: TEXT_PLAIN, body: 'Hello world' }),
  },
  {
    method: 'GET',
    path: '/health',
    respond: () => jsonResponse(200, { status: 'ok' }),
  },
];

/**
 * Find the route for a request in a single pass over the table
 * Paths are compared exactly: no case folding, no trailing-slash normalization.
 * HEAD is answered by the GET route of the same path.
 */
export function findRoute(
  routes: readonly Route[],
  method: string | undefined,
  path: string
): Route | undefined {
  const lookupMethod = method === 'HEAD' ? 'GET' : method;

  return routes.find((route) => route.method === lookupMethod && route.path === path);
}

const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\/[^/?]*/i;

/**
 * Path part of a request target, without the query string
 * Absolute-form targets (`http://host:port/path`) lose their scheme and authority.
 */
export function requestPath(url: string | undefined): string {
  if (!url) {
    return '/';
  }

  const target = url.replace(ABSOLUTE_FORM, '');
  const queryStart = target.indexOf('?');
  const path = queryStart === -1 ? target : target.slice(0, queryStart);

  return path === '' ? '/' : path;
}

/**
 * Response for anything the route table does not match
 */
export function notFoundResponse(): RouteResponse {
  return jsonResponse(404, { error: 'Not found' });
}

/**
 * Response for an unexpected failure while producing a response
 * Error details are only exposed in debug mode
 */
export function internalErrorResponse(error: unknown, debug: boolean): RouteResponse {
  if (!debug) {
    return jsonResponse(500, { error: 'Internal server error' });
  }

  const detail = error instanceof Error ? error.message : String(error);
  return jsonResponse(500, { error: 'Internal server error', detail });
}
