/**
 * Classifier Worker
 *
 * Consumes the classify_document queue, runs the pipeline for each job and
 * reaps jobs left RUNNING by crashed workers.
 */

import {
  logger,
  config,
  createCore,
  serveMetrics,
  reportQueueMetrics,
  BullWorkQueue,
  RedisJobStore,
  QUEUE_NAMES,
} from '@doctype/core';

const queue = new BullWorkQueue();
const store = new RedisJobStore();

// Registers JobManager.execute as the BullMQ processor
const core = createCore({ store, queue });

core.reaper.start();

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.workerMetricsPort);

const queueMetricsTimer = setInterval(() => {
  reportQueueMetrics([{ name: QUEUE_NAMES.CLASSIFY_DOCUMENT, queue: queue.getQueue() }]).catch((err: unknown) => {
    logger.error('Queue metrics report failed', err);
  });
}, 15000);
queueMetricsTimer.unref();

logger.info('Classifier worker started', {
  concurrency: config.workerConcurrency,
  media_types: core.extractors.supportedMediaTypes(),
  industries: core.strategies.industries(),
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  clearInterval(queueMetricsTimer);
  metricsServer.close();
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
