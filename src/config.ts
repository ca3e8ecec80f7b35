/**
 * Configuration management with environment variable loading and validation
 * Fails fast at startup if configuration is invalid
 */

import type { AppConfig, ServerMode } from './types.js';

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);
const SERVER_MODES: readonly ServerMode[] = ['framework', 'native'];

/**
 * Parse and validate port number
 */
function parsePort(value: string | undefined, defaultValue: number): number {
  const port = value ? parseInt(value, 10) : defaultValue;

  if (isNaN(port)) {
    throw new Error('PORT must be a valid number');
  }

  if (port < 1 || port > 65535) {
    throw new Error('PORT must be between 1 and 65535');
  }

  return port;
}

/**
 * Parse and validate string value
 */
function parseString(
  value: string | undefined,
  defaultValue: string,
  name: string
): string {
  const trimmed = (value || defaultValue).trim();

  if (trimmed === '') {
    throw new Error(`${name} cannot be empty`);
  }

  return trimmed;
}

/**
 * Parse a boolean flag such as "true", "0" or "off"
 */
function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
  name: string
): boolean {
  if (!value) {
    return defaultValue;
  }

  const word = value.trim().toLowerCase();

  if (TRUE_WORDS.has(word)) {
    return true;
  }

  if (FALSE_WORDS.has(word)) {
    return false;
  }

  throw new Error(`${name} must be a boolean (true/false)`);
}

function isServerMode(value: string): value is ServerMode {
  return SERVER_MODES.some((mode) => mode === value);
}

/**
 * Parse and validate server implementation selector
 */
function parseServerMode(value: string | undefined): ServerMode {
  const mode = (value || 'framework').trim().toLowerCase();

  if (!isServerMode(mode)) {
    throw new Error(`SERVER_MODE must be one of: ${SERVER_MODES.join(', ')}`);
  }

  return mode;
}

/**
 * Load and validate application configuration from environment variables
 * Throws error immediately if any configuration is invalid (fail-fast)
 */
export function getConfig(): AppConfig {
  return {
    port: parsePort(process.env.PORT, 3000),
    host: parseString(process.env.HOST, 'localhost', 'HOST'),
    debug: parseBoolean(process.env.DEBUG, false, 'DEBUG'),
    logRequests: parseBoolean(process.env.LOG_REQUESTS, true, 'LOG_REQUESTS'),
    serverMode: parseServerMode(process.env.SERVER_MODE),
  };
}
