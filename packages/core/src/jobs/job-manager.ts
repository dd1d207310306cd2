/**
 * Job Manager
 *
 * Accepts files for asynchronous classification and runs them on the worker
 * side. Job state only moves PENDING → RUNNING → SUCCESS | FAILURE, and every
 * move is a compare-and-set against the store.
 */

import { ulid } from 'ulid';
import type { ErrorInfo, FileInput, Job } from '../types';
import {
  InfrastructureError,
  isRetriable,
  JobCancelledError,
  JobNotFoundError,
  JobTimeoutError,
  toErrorInfo,
} from '../errors';
import type { ClassificationPipeline } from '../pipeline';
import type { JobStore } from './store';
import type { WorkItem, WorkQueue } from './work-queue';
import { getCorrelationId, withContext } from '../context';
import { jobDurationHistogram, jobsProcessedCounter } from '../metrics';
import { logger } from '../logger';
import { config } from '../config';

export interface JobManagerOptions {
  jobTimeoutMs?: number;
}

export interface SubmitOptions {
  batchId?: string;
  /** Use a pre-assigned id instead of generating one */
  jobId?: string;
  /** Keep the input in the store so the job can be resubmitted */
  retainInput?: boolean;
}

export function newJobId(): string {
  return `job_${ulid()}`;
}

/**
 * Reject a promise that has not settled within `timeoutMs`.
 * The underlying work is not interrupted.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new JobTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class JobManager {
  readonly jobTimeoutMs: number;

  constructor(
    private readonly store: JobStore,
    private readonly queue: WorkQueue,
    private readonly pipeline: ClassificationPipeline,
    options: JobManagerOptions = {}
  ) {
    this.jobTimeoutMs = options.jobTimeoutMs ?? config.jobTimeoutMs;
  }

  /**
   * Accept a file for classification without waiting for it.
   *
   * @throws UnknownIndustryError / FileTooLargeError before anything is created
   * @throws InfrastructureError when the job cannot be stored
   */
  async submit(file: FileInput, industry?: string, options: SubmitOptions = {}): Promise<Job> {
    this.pipeline.validate(file, industry);

    const job: Job = {
      id: options.jobId ?? newJobId(),
      state: 'PENDING',
      ...(industry !== undefined && { industry }),
      ...(file.filename !== undefined && { filename: file.filename }),
      ...(options.batchId !== undefined && { batch_id: options.batchId }),
      attempts: 0,
      created_at: new Date().toISOString(),
    };
    if (options.retainInput) {
      await this.store.saveInput(job.id, file);
    }
    await this.store.createJob(job);

    try {
      await this.queue.enqueue({
        jobId: job.id,
        file,
        ...(industry !== undefined && { industry }),
        correlationId: getCorrelationId(),
        ...(options.batchId !== undefined && { batchId: options.batchId }),
      });
    } catch (error) {
      logger.error('Failed to enqueue job', error, { jobId: job.id });
      const cause = error instanceof InfrastructureError
        ? error
        : new InfrastructureError('queue_unavailable', error instanceof Error ? error.message : String(error));
      const failed = this.finish(job, {
        ...cause.toErrorInfo(),
        reason: 'queue_unavailable',
      });
      await this.store.transitionJob(job.id, 'PENDING', failed);
      jobsProcessedCounter.inc({ status: 'FAILURE', error_code: 'INFRASTRUCTURE_ERROR' });
      return failed;
    }

    logger.info('Job submitted', { jobId: job.id, batchId: options.batchId, industry });
    return job;
  }

  /**
   * Store a job that failed before it could be accepted, so batch members
   * rejected at submission still have a status. Input is only retained when
   * a retry could succeed.
   */
  async recordRejected(file: FileInput, error: unknown, industry?: string, options: SubmitOptions = {}): Promise<Job> {
    const now = new Date().toISOString();
    const job: Job = {
      id: options.jobId ?? newJobId(),
      state: 'FAILURE',
      ...(industry !== undefined && { industry }),
      ...(file.filename !== undefined && { filename: file.filename }),
      ...(options.batchId !== undefined && { batch_id: options.batchId }),
      attempts: 0,
      error: toErrorInfo(error),
      created_at: now,
      finished_at: now,
    };
    if (options.retainInput && isRetriable(error)) {
      await this.store.saveInput(job.id, file);
    }
    await this.store.createJob(job);
    jobsProcessedCounter.inc({ status: 'FAILURE', error_code: job.error?.code ?? 'CLASSIFIER_ERROR' });
    return job;
  }

  /**
   * Worker-side execution of one delivery.
   *
   * Pipeline failures end as FAILURE on the job and never throw. Store
   * failures throw InfrastructureError so the queue can redeliver. A run that
   * times out fails the job at once, but the delivery only completes when the
   * run settles, so the worker slot stays occupied until then.
   */
  async execute(work: WorkItem): Promise<void> {
    await withContext(
      { correlationId: work.correlationId, jobId: work.jobId, batchId: work.batchId },
      async () => {
        const running = await this.claim(work);
        if (!running) return;

        const endTimer = jobDurationHistogram.startTimer();
        const run = this.pipeline.run(work.file, work.industry);
        let timedOut = false;

        try {
          let outcome: Job;
          try {
            const result = await withTimeout(run, this.jobTimeoutMs);
            outcome = { ...running, state: 'SUCCESS', result, finished_at: new Date().toISOString() };
          } catch (error) {
            timedOut = error instanceof JobTimeoutError;
            outcome = this.finish(running, toErrorInfo(error));
          }

          await this.record(running, outcome, work.attempt);
          endTimer({ status: outcome.state });
        } finally {
          if (timedOut) {
            await run.then(
              () => logger.warn('Timed out run completed, result discarded'),
              (error: unknown) => logger.warn('Timed out run failed', { error: toErrorInfo(error).message })
            );
          }
        }
      }
    );
  }

  private async record(running: Job, outcome: Job, attempt: number): Promise<void> {
    // Only the attempt that claimed the job may finish it
    const applied = await this.store.transitionJob(running.id, 'RUNNING', outcome, running.attempts);

    if (!applied) {
      logger.warn('Job outcome discarded, job no longer held by this attempt', { outcome: outcome.state });
      return;
    }

    jobsProcessedCounter.inc({ status: outcome.state, error_code: outcome.error?.code ?? 'none' });
    logger.info('Job finished', {
      state: outcome.state,
      document_type: outcome.result?.document_type,
      error_code: outcome.error?.code,
      attempt,
    });
  }

  /**
   * Move the job to RUNNING for this delivery, or decide to skip it.
   */
  private async claim(work: WorkItem): Promise<Job | undefined> {
    const job = await this.store.getJob(work.jobId);
    if (!job) {
      logger.warn('Job not found for work item, skipping');
      return undefined;
    }

    const startedAt = new Date().toISOString();

    if (job.state === 'PENDING') {
      const running: Job = { ...job, state: 'RUNNING', attempts: job.attempts + 1, started_at: startedAt };
      return (await this.store.transitionJob(job.id, 'PENDING', running)) ? running : undefined;
    }

    // A redelivery after a crash or store outage between claim and finish
    if (job.state === 'RUNNING' && work.attempt > 1) {
      const resumed: Job = { ...job, attempts: job.attempts + 1, started_at: startedAt };
      logger.info('Resuming job from previous attempt', { attempt: work.attempt });
      return (await this.store.transitionJob(job.id, 'RUNNING', resumed, job.attempts)) ? resumed : undefined;
    }

    logger.info('Skipping job that is not PENDING', { state: job.state, attempt: work.attempt });
    return undefined;
  }

  private finish(job: Job, error: ErrorInfo): Job {
    return { ...job, state: 'FAILURE', error, finished_at: new Date().toISOString() };
  }

  /**
   * @throws JobNotFoundError
   */
  async status(jobId: string): Promise<Job> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /**
   * Cancel a job that no worker has claimed yet.
   *
   * @returns false when the job is already RUNNING or terminal
   */
  async cancel(jobId: string): Promise<boolean> {
    const job = await this.status(jobId);
    if (job.state !== 'PENDING') {
      return false;
    }

    const cancelled = this.finish(job, new JobCancelledError().toErrorInfo());
    const applied = await this.store.transitionJob(jobId, 'PENDING', cancelled);
    if (applied) {
      jobsProcessedCounter.inc({ status: 'FAILURE', error_code: 'CANCELLED' });
      logger.info('Job cancelled', { jobId });
    }
    return applied;
  }
}
