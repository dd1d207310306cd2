/**
 * Batch Coordinator
 *
 * Fans a batch out into one job per file and derives the batch state from
 * its members on every read. A bad file fails its own job, never the batch.
 *
 * The batch record, with every member id assigned up front, is written
 * before any member exists, so no member ever points at a batch that was
 * not stored. Members keep their input for retries.
 */

import { ulid } from 'ulid';
import type { BatchJob, BatchRecord, BatchState, ClassificationResult, FileInput, Job, JobState } from '../types';
import { BatchNotFoundError, ClassificationError, InfrastructureError, ValidationError } from '../errors';
import type { JobStore } from './store';
import { newJobId, type JobManager } from './job-manager';
import { withContext } from '../context';
import { logger } from '../logger';
import { config } from '../config';

export interface BatchItem {
  file: FileInput;
  industry?: string;
}

export interface BatchResultEntry {
  job_id: string;
  filename?: string;
  result: ClassificationResult;
}

export interface BatchRetry {
  batch: BatchJob;
  /** Ids of the jobs submitted in place of failed members */
  retried_job_ids: string[];
}

export interface BatchCoordinatorOptions {
  maxBatchSize?: number;
}

/**
 * Batch state from member states.
 *
 * All PENDING → PENDING; all SUCCESS → SUCCESS; all FAILURE → FAILURE;
 * all terminal but mixed → PARTIAL; otherwise RUNNING.
 */
export function deriveBatchState(states: readonly JobState[]): BatchState {
  if (states.length === 0 || states.every((state) => state === 'PENDING')) return 'PENDING';
  if (states.every((state) => state === 'SUCCESS')) return 'SUCCESS';
  if (states.every((state) => state === 'FAILURE')) return 'FAILURE';
  if (states.every((state) => state === 'SUCCESS' || state === 'FAILURE')) return 'PARTIAL';
  return 'RUNNING';
}

export function countStates(states: readonly JobState[]): Record<JobState, number> {
  const counts: Record<JobState, number> = { PENDING: 0, RUNNING: 0, SUCCESS: 0, FAILURE: 0 };
  for (const state of states) {
    counts[state]++;
  }
  return counts;
}

export class BatchCoordinator {
  readonly maxBatchSize: number;

  constructor(
    private readonly store: JobStore,
    private readonly jobs: JobManager,
    options: BatchCoordinatorOptions = {}
  ) {
    this.maxBatchSize = options.maxBatchSize ?? config.maxBatchSize;
  }

  /**
   * @throws ValidationError for an empty or oversized batch
   * @throws InfrastructureError when the store is unavailable
   */
  async submitBatch(items: readonly BatchItem[], defaultIndustry?: string): Promise<BatchJob> {
    if (items.length === 0) {
      throw new ValidationError('Batch must contain at least one file');
    }
    if (items.length > this.maxBatchSize) {
      throw new ValidationError(`Batch of ${items.length} files exceeds limit of ${this.maxBatchSize}`);
    }

    const batchId = `batch_${ulid()}`;
    const planned = items.map((item) => ({
      jobId: newJobId(),
      file: item.file,
      industry: item.industry ?? defaultIndustry,
    }));

    const record: BatchRecord = {
      id: batchId,
      member_job_ids: planned.map((member) => member.jobId),
      created_at: new Date().toISOString(),
    };
    await this.store.createBatch(record);

    const states: JobState[] = [];
    for (const member of planned) {
      states.push(await this.submitMember(batchId, member.jobId, member.file, member.industry));
    }

    logger.info('Batch submitted', { batchId, size: planned.length });

    return { ...record, state: deriveBatchState(states), counts: countStates(states) };
  }

  /**
   * Create and enqueue one member. Never throws: a member that cannot be
   * accepted is recorded as FAILURE, or left missing when even that write
   * fails, which reads as FAILURE too.
   */
  private async submitMember(batchId: string, jobId: string, file: FileInput, industry?: string): Promise<JobState> {
    const options = { batchId, jobId, retainInput: true };

    return withContext({ batchId, jobId }, async () => {
      try {
        return (await this.jobs.submit(file, industry, options)).state;
      } catch (error) {
        let cause: ClassificationError;
        if (error instanceof ClassificationError && !(error instanceof InfrastructureError)) {
          logger.warn('Batch member rejected at submission', { filename: file.filename, code: error.code });
          cause = error;
        } else {
          logger.error('Batch member could not be submitted', error, { filename: file.filename });
          cause = error instanceof InfrastructureError
            ? error
            : new InfrastructureError('store_unavailable', error instanceof Error ? error.message : String(error));
        }

        try {
          return (await this.jobs.recordRejected(file, cause, industry, options)).state;
        } catch (recordError) {
          logger.error('Failed to record batch member failure', recordError);
          return 'FAILURE';
        }
      }
    });
  }

  private async load(batchId: string): Promise<{ record: BatchRecord; members: Job[] }> {
    const record = await this.store.getBatch(batchId);
    if (!record) {
      throw new BatchNotFoundError(batchId);
    }

    const found = await this.store.getJobs(record.member_job_ids);
    const members: Job[] = [];
    found.forEach((job, index) => {
      if (job) {
        members.push(job);
      } else {
        logger.warn('Batch member missing from store', { batchId, jobId: record.member_job_ids[index] });
      }
    });
    return { record, members };
  }

  /**
   * @throws BatchNotFoundError
   */
  async status(batchId: string): Promise<BatchJob> {
    const { record, members } = await this.load(batchId);

    // An expired member record can no longer finish
    const missing = record.member_job_ids.length - members.length;
    const states: JobState[] = [...members.map((job) => job.state), ...Array<JobState>(missing).fill('FAILURE')];

    return { ...record, state: deriveBatchState(states), counts: countStates(states) };
  }

  /**
   * Cancel the members no worker has claimed yet.
   *
   * @returns ids of the cancelled jobs
   */
  async cancel(batchId: string): Promise<string[]> {
    const { members } = await this.load(batchId);
    const cancelled: string[] = [];

    for (const job of members) {
      if (job.state === 'PENDING' && (await this.jobs.cancel(job.id))) {
        cancelled.push(job.id);
      }
    }

    logger.info('Batch cancelled', { batchId, cancelled: cancelled.length });
    return cancelled;
  }

  /**
   * Resubmit every failed or cancelled member as a new job in the same
   * position. Terminal jobs never change, so each retry gets a fresh id.
   * Members whose input has expired are left as they are.
   *
   * @throws BatchNotFoundError
   */
  async retry(batchId: string): Promise<BatchRetry> {
    const record = await this.store.getBatch(batchId);
    if (!record) {
      throw new BatchNotFoundError(batchId);
    }

    const members = await this.store.getJobs(record.member_job_ids);
    const memberIds = [...record.member_job_ids];
    const resubmissions: Array<{ jobId: string; file: FileInput; industry?: string }> = [];

    for (const [index, job] of members.entries()) {
      if (!job || job.state !== 'FAILURE') continue;

      const file = await this.store.getInput(job.id);
      if (!file) {
        logger.warn('Cannot retry batch member, input expired', { batchId, jobId: job.id });
        continue;
      }

      const jobId = newJobId();
      memberIds[index] = jobId;
      resubmissions.push({ jobId, file, industry: job.industry });
    }

    // Point the batch at the new ids before any of them exists
    if (resubmissions.length > 0) {
      await this.store.updateBatch({ ...record, member_job_ids: memberIds });
    }
    for (const member of resubmissions) {
      await this.submitMember(batchId, member.jobId, member.file, member.industry);
    }
    const retried = resubmissions.map((member) => member.jobId);

    logger.info('Batch retried', { batchId, retried: retried.length });

    return { batch: await this.status(batchId), retried_job_ids: retried };
  }

  /**
   * Results of the members that succeeded, in submission order.
   */
  async results(batchId: string): Promise<BatchResultEntry[]> {
    const { members } = await this.load(batchId);
    const entries: BatchResultEntry[] = [];

    for (const job of members) {
      if (job.state === 'SUCCESS' && job.result) {
        entries.push({
          job_id: job.id,
          ...(job.filename !== undefined && { filename: job.filename }),
          result: job.result,
        });
      }
    }
    return entries;
  }
}
