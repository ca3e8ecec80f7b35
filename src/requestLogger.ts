/**
 * Per-request console logging
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { LogSink } from './types.js';

export type RequestLogger = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void
) => void;

/**
 * Format a log line: timestamp, method, url, status and duration
 */
export function formatRequestLine(
  method: string | undefined,
  url: string | undefined,
  status: number,
  durationMs: number,
  at: Date = new Date()
): string {
  return `${at.toISOString()} ${method ?? '-'} ${url ?? '-'} ${status} ${durationMs}ms`;
}

/**
 * Create middleware that writes one line per request once the response closes
 * `close` also fires when the client aborts before the response is sent.
 * Works with Express and with the plain node:http listener.
 * A failing sink is reported on stderr and never touches the response.
 */
export function createRequestLogger(sink: LogSink = console.log): RequestLogger {
  return (req, res, next) => {
    const startedAt = Date.now();

    res.once('close', () => {
      const line = formatRequestLine(req.method, req.url, res.statusCode, Date.now() - startedAt);

      try {
        sink(line);
      } catch (error) {
        console.error('Request log write failed:', error);
      }
    });

    next();
  };
}
