/**
 * @fileoverview Server entry point for the roster calendar converter.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { createLogger, initObservability } from './utils/observability/index.js';

// Fail fast if configuration is invalid
validateConfig();
initObservability();

const log = createLogger({ domain: 'server' });
const app = createApp();

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    timezone: config.roster.timezone,
    maxUploadBytes: config.upload.maxBytes,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced', { reason: 'timeout' });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    log.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
