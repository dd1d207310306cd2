/**
 * Classifier API
 *
 * HTTP adapter over ClassificationService. Holds no pipeline logic.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  withContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  ValidationError,
  toErrorInfo,
  type BatchItem,
  type Core,
  type ErrorInfo,
} from '@doctype/core';
import type { Queue } from 'bullmq';

export interface ErrorEnvelope {
  error: ErrorInfo & { correlation_id: string };
}

export interface AppOptions {
  /** BullMQ queue for backpressure checks; absent in single-process mode */
  queue?: Queue;
  maxBodyBytes?: string;
}

export function statusFor(info: ErrorInfo): number {
  switch (info.code) {
    case 'NOT_FOUND':
      return 404;
    case 'FILE_TOO_LARGE':
      return 413;
    case 'UNKNOWN_INDUSTRY':
    case 'VALIDATION_ERROR':
      return 400;
    case 'CLASSIFIER_ERROR':
      return 500;
    default:
      return info.retryable ? 503 : 422;
  }
}

function sendError(res: Response, error: unknown): void {
  const info = toErrorInfo(error);
  const status = statusFor(info);
  if (status >= 500) {
    logger.error('Request failed', error);
  }
  const envelope: ErrorEnvelope = {
    error: { ...info, correlation_id: getCorrelationId() },
  };
  res.status(status).json(envelope);
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse `{ files: [{ filename, content_base64, industry? }], industry? }`.
 */
export function parseBatchBody(body: unknown): { items: BatchItem[]; industry?: string } {
  if (!isRecord(body) || !Array.isArray(body.files)) {
    throw new ValidationError('Body must be an object with a files array');
  }

  const items = body.files.map((entry: unknown, index: number): BatchItem => {
    if (!isRecord(entry) || typeof entry.content_base64 !== 'string') {
      throw new ValidationError(`files[${index}].content_base64 must be a string`);
    }
    return {
      file: {
        bytes: Buffer.from(entry.content_base64, 'base64'),
        ...(typeof entry.filename === 'string' && { filename: entry.filename }),
      },
      ...(typeof entry.industry === 'string' && { industry: entry.industry }),
    };
  });

  return { items, ...(typeof body.industry === 'string' && { industry: body.industry }) };
}

export function createApp(core: Core, options: AppOptions = {}): express.Express {
  const app = express();
  const { service } = core;

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    withContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = typeof req.route?.path === 'string' ? req.route.path : req.path;

      httpRequestDurationHistogram.observe({ method: req.method, path, status: res.statusCode.toString() }, duration);
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await core.store.ping();
      const backpressure = options.queue ? await checkBackpressure(options.queue) : undefined;

      res.json({
        status: 'healthy',
        service: 'classifier-api',
        ...(backpressure && { queue_depth: backpressure.depth }),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'classifier-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  app.get('/strategies', (req: Request, res: Response) => {
    res.json(service.describe());
  });

  /**
   * Rejects new async work when the queue is saturated.
   * @returns true when the request was rejected
   */
  async function rejectedForBackpressure(res: Response): Promise<boolean> {
    if (!options.queue) return false;
    const backpressure = await checkBackpressure(options.queue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
      res.status(503).json({
        error: {
          code: 'INFRASTRUCTURE_ERROR',
          message: 'System is under heavy load. Please retry later.',
          reason: 'backpressure',
          retryable: true,
          correlation_id: getCorrelationId(),
        },
      });
      return true;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
    }
    return false;
  }

  /**
   * POST /classify?industry=&async=
   * Body is the raw file.
   */
  app.post(
    '/classify',
    express.raw({ type: () => true, limit: options.maxBodyBytes ?? '50mb' }),
    async (req: Request, res: Response) => {
      try {
        const bytes: unknown = req.body;
        const filename = queryString(req.query.filename);
        const file = {
          bytes: Buffer.isBuffer(bytes) ? bytes : Buffer.alloc(0),
          ...(filename !== undefined && { filename }),
        };
        const industry = queryString(req.query.industry);

        if (req.query.async === 'true') {
          if (await rejectedForBackpressure(res)) return;
          const jobId = await service.classifyAsync(file, industry);
          res.status(202).json({ job_id: jobId, correlation_id: getCorrelationId() });
          return;
        }

        const result = await service.classifySync(file, industry);
        if (result.ok) {
          res.json(result.value);
          return;
        }
        const envelope: ErrorEnvelope = {
          error: { ...result.error, correlation_id: getCorrelationId() },
        };
        res.status(statusFor(result.error)).json(envelope);
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  app.get('/jobs/:id', async (req: Request, res: Response) => {
    try {
      res.json(await service.getStatus(req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/batches', express.json({ limit: options.maxBodyBytes ?? '50mb' }), async (req: Request, res: Response) => {
    try {
      const { items, industry } = parseBatchBody(req.body);
      if (await rejectedForBackpressure(res)) return;
      const batchId = await service.submitBatch(items, industry);
      res.status(202).json({ batch_id: batchId, correlation_id: getCorrelationId() });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/batches/:id', async (req: Request, res: Response) => {
    try {
      res.json(await service.getBatchStatus(req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/batches/:id/cancel', async (req: Request, res: Response) => {
    try {
      const cancelled = await service.cancelBatch(req.params.id);
      res.json({ batch_id: req.params.id, cancelled_job_ids: cancelled });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/batches/:id/retry', async (req: Request, res: Response) => {
    try {
      const { batch, retried_job_ids } = await service.retryBatch(req.params.id);
      res.status(retried_job_ids.length > 0 ? 202 : 200).json({
        batch_id: batch.id,
        state: batch.state,
        retried_job_ids,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/batches/:id/results', async (req: Request, res: Response) => {
    try {
      const results = await service.getBatchResults(req.params.id);
      res.json({ batch_id: req.params.id, results });
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}
