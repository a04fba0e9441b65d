/**
 * Relay Entry Point
 *
 * Background process that:
 * - Polls the capture album for new items
 * - Queues them in a bounded upload queue
 * - Drains the queue to every enabled destination
 * - Serves health and metrics when HEALTH_PORT is set
 */

import { AlbumLocator, FsStorage } from '@capture-relay/album';
import {
  UploadQueue,
  closeHttpAgents,
  createDestinations,
  describeDestinations,
} from '@capture-relay/upload';
import { createLogger, formatDuration } from '@capture-relay/utils';
import { config, configWarnings } from './config/index.js';
import { logger } from './lib/logger.js';
import { startHealthServer, type HealthServer } from './lib/health.js';
import { CaptureDetector } from './detector.js';

// Track shutdown state
let isShuttingDown = false;

for (const warning of configWarnings) {
  logger.warn(warning);
}

const storage = new FsStorage();
const destinations = createDestinations(config.destinations, { storage, logger });
const channels = describeDestinations(destinations);

const detector = new CaptureDetector({
  locator: new AlbumLocator({
    root: config.albumRoot,
    storage,
    logger: createLogger({ component: 'locator' }, logger),
  }),
  storage,
  queue: new UploadQueue(config.queueCapacity),
  destinations,
  intervalMs: config.checkIntervalSeconds * 1000,
  logger: createLogger({ component: 'detector' }, logger),
});

detector.on('error', (error: unknown) => {
  logger.debug({ error }, 'Detector reported an error');
});

detector.on('worker:exit', summary => {
  logger.info({ ...summary, duration: formatDuration(summary.durationMs) }, 'Upload worker finished');
});

let healthServer: HealthServer | null = null;

// Graceful shutdown
const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    logger.warn({ signal }, 'Shutdown already in progress');
    return;
  }

  isShuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received');

  // Set a hard timeout for shutdown
  const forceExitTimeout = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000);

  try {
    logger.info('Stopping detector...');
    await detector.stop();

    if (healthServer) {
      logger.info('Closing health server...');
      await healthServer.close();
    }

    await closeHttpAgents();

    clearTimeout(forceExitTimeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    clearTimeout(forceExitTimeout);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception');
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection');
  void shutdown('unhandledRejection');
});

async function main(): Promise<void> {
  if (config.healthPort > 0) {
    healthServer = await startHealthServer({
      port: config.healthPort,
      getStatus: () => detector.getStatus(),
      destinations: channels,
      logger: createLogger({ component: 'health' }, logger),
    });
  }

  await detector.start();

  logger.info({
    albumRoot: config.albumRoot,
    intervalSeconds: config.checkIntervalSeconds,
    queueCapacity: config.queueCapacity,
    destinations: channels,
  }, 'Relay started');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Startup failed');
  process.exit(1);
});
