/**
 * Classifier API
 *
 * Synchronous classification in-request; async jobs and batches go to the
 * classify_document queue for the classifier workers.
 */

import { logger, config, createCore, BullWorkQueue, RedisJobStore } from '@doctype/core';
import { createApp } from './app';

const port = parseInt(process.env.PORT || String(config.apiPort), 10);

const queue = new BullWorkQueue();

// Jobs are executed by services/worker-classifier, not here
const core = createCore({ store: new RedisJobStore(), queue, processJobs: false });

const app = createApp(core, { queue: queue.getQueue() });

// Start server
const server = app.listen(port, () => {
  logger.info('Classifier API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await core.close();
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
