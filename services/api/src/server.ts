import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { MemorySessionStore } from './session/store.js';

const SWEEP_INTERVAL_MS = 60_000;

const config = loadConfig();
const logger = createLogger('server', { silent: config.env === 'test' });
const store = new MemorySessionStore({ ttlMs: config.sessionTtlMs });
const app = createApp({ config, store, logger });

let httpServer: Server | null = null;
let sweepTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

function startServer() {
  httpServer = app.listen(config.port, config.host, () => {
    const address = httpServer?.address();
    if (!address || typeof address === 'string') {
      logger.info(`Game API listening on port ${config.port}`);
      return;
    }
    const addressText = address.address;
    const isWildcardHost = addressText === '::' || addressText === '0.0.0.0';
    const displayHost = isWildcardHost ? 'localhost' : addressText;
    logger.info(`Game API listening on http://${displayHost}:${address.port}`);
  });

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(
        `Port ${config.port} is already in use. Stop the other process or set PORT to an available value.`
      );
    } else {
      logger.error('HTTP server error', { error: err.message });
    }
    shutdown('HTTP server failed to start', 1).catch(() => process.exit(1));
  });

  sweepTimer = setInterval(() => {
    const removed = store.sweep();
    if (removed > 0) {
      logger.child('session').debug('Expired sessions removed', { removed });
    }
  }, SWEEP_INTERVAL_MS);
  sweepTimer.unref();
}

async function shutdown(reason: string, exitCode = 0) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(reason);

  if (sweepTimer) {
    clearInterval(sweepTimer);
    sweepTimer = null;
  }

  const server = httpServer;
  httpServer = null;
  if (server) {
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      logger.warn('Error while closing HTTP server', {
        error: err instanceof Error ? err.message : String(err),
      });
      exitCode = exitCode || 1;
    }
  }

  process.exit(exitCode);
}

const handleSignal = (signal: NodeJS.Signals) => {
  shutdown(`Received ${signal}, shutting down...`).catch((err) => {
    logger.error('Error while shutting down', { error: String(err) });
    process.exit(1);
  });
};

process.once('SIGINT', handleSignal);
process.once('SIGTERM', handleSignal);

try {
  startServer();
} catch (err) {
  logger.error('Failed to start', { error: err instanceof Error ? err.message : String(err) });
  shutdown('Startup failed', 1).catch(() => process.exit(1));
}
