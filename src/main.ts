/**
 * Process startup: load configuration, bind the server, exit 1 on failure
 */

import { getConfig } from './config.js';
import { ROUTES } from './routes.js';
import { startServer } from './startup.js';

/**
 * Load configuration and start the HTTP server
 * Throws on invalid configuration or bind failure
 */
export async function start(): Promise<void> {
  // Load and validate configuration (fails fast if invalid)
  const config = getConfig();

  if (config.debug) {
    console.log('Configuration:', config);
  }

  await startServer(config);

  console.log(`Server (${config.serverMode}) listening on http://${config.host}:${config.port}`);
  for (const route of ROUTES) {
    console.log(`  ${route.method} ${route.path}`);
  }
}

/**
 * Start the server; any startup error is printed and ends the process with status 1
 */
export async function run(): Promise<void> {
  try {
    await start();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
