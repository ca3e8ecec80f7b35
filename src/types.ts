/**
 * Type definitions for the hello server
 */

/**
 * Which server implementation answers requests
 * - framework: Express application
 * - native: request listener on node:http
 */
export type ServerMode = 'framework' | 'native';

/**
 * Methods a route can be registered for
 */
export type HttpMethod = 'GET';

/**
 * Response produced for a single request
 */
export interface RouteResponse {
  /** HTTP status code */
  status: number;
  /** Full Content-Type header value, charset included */
  contentType: string;
  /** Response body, written as UTF-8 */
  body: string;
}

/**
 * Entry of the route table: exact (method, path) pair and its response
 */
export interface Route {
  method: HttpMethod;
  /** Matched by exact, case-sensitive comparison */
  path: string;
  respond: () => RouteResponse;
}

/**
 * Destination of per-request log lines
 */
export type LogSink = (line: string) => void;

/**
 * Application configuration loaded from environment
 */
export interface AppConfig {
  /** Interface or hostname to bind */
  host: string;
  /** TCP port to bind */
  port: number;
  /** Adds error details to 500 responses and prints the config at start-up */
  debug: boolean;
  /** Writes one console line per request */
  logRequests: boolean;
  serverMode: ServerMode;
}

/**
 * Per-instance overrides, mostly used by tests
 */
export interface ServerOptions {
  routes?: readonly Route[];
  logSink?: LogSink;
}
