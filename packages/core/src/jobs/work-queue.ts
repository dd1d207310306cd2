/**
 * Work Queues
 *
 * Dispatch of accepted jobs to workers. The queue owns retries: a handler
 * failure marked retriable is redelivered up to `maxAttempts` times, anything
 * else is final.
 */

import { UnrecoverableError, type Job as BullJob, type Queue, type Worker } from 'bullmq';
import type { FileInput } from '../types';
import { InfrastructureError, isRetriable } from '../errors';
import { createQueue, createWorker, QUEUE_NAMES, type ClassifyDocumentJob } from '../queues';
import { config } from '../config';
import { logger } from '../logger';

export interface WorkRequest {
  jobId: string;
  file: FileInput;
  industry?: string;
  correlationId: string;
  batchId?: string;
}

export interface WorkItem extends WorkRequest {
  /** 1-based delivery attempt */
  attempt: number;
  maxAttempts: number;
}

export type WorkHandler = (work: WorkItem) => Promise<void>;

export interface WorkQueue {
  /**
   * @throws InfrastructureError when the queue cannot accept work
   */
  enqueue(work: WorkRequest): Promise<void>;
  /** Start delivering work to `handler` */
  process(handler: WorkHandler): void;
  close(): Promise<void>;
}

// ============================================================================
// In-process queue
// ============================================================================

export interface InProcessWorkQueueOptions {
  concurrency?: number;
  maxAttempts?: number;
  /** Base delay before a retry; doubles per attempt */
  backoffBaseMs?: number;
}

/**
 * Bounded-concurrency FIFO pool in the current process.
 */
export class InProcessWorkQueue implements WorkQueue {
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;

  private readonly pending: WorkItem[] = [];
  private readonly retryTimers = new Set<NodeJS.Timeout>();
  private idleWaiters: Array<() => void> = [];
  private handler: WorkHandler | undefined;
  private active = 0;
  private closed = false;

  constructor(options: InProcessWorkQueueOptions = {}) {
    this.concurrency = options.concurrency ?? config.workerConcurrency;
    this.maxAttempts = options.maxAttempts ?? config.maxJobAttempts;
    this.backoffBaseMs = options.backoffBaseMs ?? config.backoffBaseMs;
  }

  async enqueue(work: WorkRequest): Promise<void> {
    if (this.closed) {
      throw new InfrastructureError('queue_unavailable', 'Work queue is closed');
    }
    this.pending.push({ ...work, attempt: 1, maxAttempts: this.maxAttempts });
    this.pump();
  }

  process(handler: WorkHandler): void {
    if (this.handler) {
      throw new Error('Work queue already has a handler');
    }
    this.handler = handler;
    this.pump();
  }

  getStats(): { active: number; queued: number; retrying: number; max: number } {
    return {
      active: this.active,
      queued: this.pending.length,
      retrying: this.retryTimers.size,
      max: this.concurrency,
    };
  }

  /**
   * Resolves once nothing is queued, running or waiting to be retried.
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.retryTimers) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    this.pending.length = 0;
    await this.drain();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0 && this.retryTimers.size === 0;
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler || this.closed) {
      this.notifyIdle();
      return;
    }

    while (this.pending.length > 0 && this.active < this.concurrency) {
      const item = this.pending.shift();
      if (!item) break;
      // Increment before starting so concurrent pumps never exceed the limit
      this.active++;
      void this.run(handler, item);
    }
    this.notifyIdle();
  }

  private async run(handler: WorkHandler, item: WorkItem): Promise<void> {
    try {
      await handler(item);
    } catch (error) {
      if (isRetriable(error) && item.attempt < item.maxAttempts && !this.closed) {
        this.scheduleRetry(item, error);
      } else {
        logger.error('Work item failed permanently', error, {
          jobId: item.jobId,
          attempt: item.attempt,
        });
      }
    } finally {
      this.active--;
      setImmediate(() => this.pump());
    }
  }

  private scheduleRetry(item: WorkItem, error: unknown): void {
    const delay = this.backoffBaseMs * 2 ** (item.attempt - 1);
    logger.warn('Retrying work item', {
      jobId: item.jobId,
      attempt: item.attempt,
      delay_ms: delay,
      error: error instanceof Error ? error.message : String(error),
    });

    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      this.pending.push({ ...item, attempt: item.attempt + 1 });
      this.pump();
    }, delay);
    this.retryTimers.add(timer);
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

// ============================================================================
// BullMQ queue
// ============================================================================

export function toPayload(work: WorkRequest): ClassifyDocumentJob {
  return {
    event_type: 'document.submitted',
    correlation_id: work.correlationId,
    job_id: work.jobId,
    ...(work.batchId !== undefined && { batch_id: work.batchId }),
    ...(work.industry !== undefined && { industry: work.industry }),
    ...(work.file.filename !== undefined && { filename: work.file.filename }),
    content_base64: work.file.bytes.toString('base64'),
    submitted_at: new Date().toISOString(),
  };
}

export function fromPayload(payload: ClassifyDocumentJob, attempt: number, maxAttempts: number): WorkItem {
  return {
    jobId: payload.job_id,
    correlationId: payload.correlation_id,
    file: {
      bytes: Buffer.from(payload.content_base64, 'base64'),
      ...(payload.filename !== undefined && { filename: payload.filename }),
    },
    ...(payload.industry !== undefined && { industry: payload.industry }),
    ...(payload.batch_id !== undefined && { batchId: payload.batch_id }),
    attempt,
    maxAttempts,
  };
}

/**
 * Redis-backed queue. Attempts and exponential backoff come from the
 * queue's default job options.
 */
export class BullWorkQueue implements WorkQueue {
  private readonly queue: Queue<ClassifyDocumentJob, void>;
  private worker: Worker<ClassifyDocumentJob, void> | undefined;

  constructor(queue?: Queue<ClassifyDocumentJob, void>) {
    this.queue = queue ?? createQueue<ClassifyDocumentJob, void>(QUEUE_NAMES.CLASSIFY_DOCUMENT);
  }

  getQueue(): Queue<ClassifyDocumentJob, void> {
    return this.queue;
  }

  async enqueue(work: WorkRequest): Promise<void> {
    try {
      await this.queue.add(QUEUE_NAMES.CLASSIFY_DOCUMENT, toPayload(work), { jobId: work.jobId });
    } catch (error) {
      throw new InfrastructureError(
        'queue_unavailable',
        `Failed to enqueue job: ${error instanceof Error ? error.message : String(error)}`,
        { jobId: work.jobId }
      );
    }
  }

  process(handler: WorkHandler): void {
    if (this.worker) {
      throw new Error('Work queue already has a handler');
    }

    this.worker = createWorker<ClassifyDocumentJob, void>(
      QUEUE_NAMES.CLASSIFY_DOCUMENT,
      async (job: BullJob<ClassifyDocumentJob, void>) => {
        const maxAttempts = job.opts.attempts ?? config.maxJobAttempts;
        try {
          await handler(fromPayload(job.data, job.attemptsMade + 1, maxAttempts));
        } catch (error) {
          if (isRetriable(error)) throw error;
          // Anything not marked retriable must not consume further attempts
          throw new UnrecoverableError(error instanceof Error ? error.message : String(error));
        }
      }
    );
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
