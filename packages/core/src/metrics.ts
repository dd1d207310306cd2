/**
 * Prometheus Metrics
 *
 * Metrics for classification outcomes, pipeline stages, job processing,
 * queue depth and HTTP traffic.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'doctype_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'doctype_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'doctype_job_duration_seconds',
  help: 'Duration of job execution in seconds',
  labelNames: ['status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'doctype_jobs_processed_total',
  help: 'Total number of jobs that reached a terminal state',
  labelNames: ['status', 'error_code'],
  registers: [register],
});

export const jobsReapedCounter = new promClient.Counter({
  name: 'doctype_jobs_reaped_total',
  help: 'Total number of stale RUNNING jobs failed by the reaper',
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsClassifiedCounter = new promClient.Counter({
  name: 'doctype_documents_classified_total',
  help: 'Total number of documents classified',
  labelNames: ['industry', 'document_type', 'format'],
  registers: [register],
});

export const classificationFailuresCounter = new promClient.Counter({
  name: 'doctype_classification_failures_total',
  help: 'Total number of pipeline runs that failed',
  labelNames: ['error_code'],
  registers: [register],
});

export const confidenceHistogram = new promClient.Histogram({
  name: 'doctype_classification_confidence',
  help: 'Confidence of produced classifications',
  labelNames: ['industry'],
  buckets: [0.1, 0.25, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 0.95],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'doctype_pipeline_stage_duration_seconds',
  help: 'Duration of pipeline stages',
  labelNames: ['stage', 'format'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

// ============================================================================
// Backpressure Metrics
// ============================================================================

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'doctype_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'doctype_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'doctype_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(queues: Array<{ name: string; queue: Queue }>): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      const depth = m.waiting + m.active;
      queueDepthGauge.set({ queue: name }, depth);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    getMetrics()
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics collection failed', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
