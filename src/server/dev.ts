/**
 * Local development server entry point.
 *
 * Starts the Mind WebSocket server on a configurable port.
 *
 * Usage:
 *   npm run dev
 *   PORT=9000 LOG_LEVEL=debug npm run dev
 */

import { createGameServer } from './ws-server.js';
import { loadConfig } from './config.js';
import { log } from '../logger.js';

const server = createGameServer(loadConfig());

function shutdown() {
  log.server.info('shutting down');
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      log.server.error({ err }, 'shutdown failed');
      process.exit(1);
    },
  );
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
