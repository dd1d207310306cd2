/**
 * Job Store
 *
 * The only mutable shared state of the job layer. Every state change goes
 * through compare-and-set so that two writers never both win a transition.
 */

import type { BatchRecord, FileInput, Job, JobState } from '../types';

export interface JobStore {
  /** Insert a new job; fails if the id already exists */
  createJob(job: Job): Promise<void>;
  getJob(id: string): Promise<Job | undefined>;
  /** Jobs in the order of `ids`; missing entries are undefined */
  getJobs(ids: readonly string[]): Promise<Array<Job | undefined>>;
  /**
   * Replace the job with `next` only if its current state is `expected` and,
   * when given, its attempt count is `expectedAttempts`.
   *
   * @returns false when the job is missing, in another state or on another attempt
   */
  transitionJob(id: string, expected: JobState, next: Job, expectedAttempts?: number): Promise<boolean>;
  /** RUNNING jobs whose `started_at` is before `before` */
  listRunningSince(before: Date): Promise<Job[]>;
  createBatch(batch: BatchRecord): Promise<void>;
  getBatch(id: string): Promise<BatchRecord | undefined>;
  /** Overwrite an existing batch record */
  updateBatch(batch: BatchRecord): Promise<void>;
  /** Keep a job's input so it can be resubmitted later */
  saveInput(jobId: string, file: FileInput): Promise<void>;
  getInput(jobId: string): Promise<FileInput | undefined>;
  /** Resolves when the backing store is reachable */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Process-local store for tests and single-process deployments.
 * Records are copied on the way in and out.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly batches = new Map<string, BatchRecord>();
  private readonly inputs = new Map<string, FileInput>();

  async createJob(job: Job): Promise<void> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job already exists: ${job.id}`);
    }
    this.jobs.set(job.id, structuredClone(job));
  }

  async getJob(id: string): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  async getJobs(ids: readonly string[]): Promise<Array<Job | undefined>> {
    return Promise.all(ids.map((id) => this.getJob(id)));
  }

  async transitionJob(id: string, expected: JobState, next: Job, expectedAttempts?: number): Promise<boolean> {
    if (next.id !== id) {
      throw new Error(`Transition target ${next.id} does not match job ${id}`);
    }
    const current = this.jobs.get(id);
    if (!current || current.state !== expected) {
      return false;
    }
    if (expectedAttempts !== undefined && current.attempts !== expectedAttempts) {
      return false;
    }
    this.jobs.set(id, structuredClone(next));
    return true;
  }

  async listRunningSince(before: Date): Promise<Job[]> {
    const cutoff = before.getTime();
    return Array.from(this.jobs.values())
      .filter((job) => job.state === 'RUNNING' && job.started_at !== undefined && Date.parse(job.started_at) < cutoff)
      .map((job) => structuredClone(job));
  }

  async createBatch(batch: BatchRecord): Promise<void> {
    if (this.batches.has(batch.id)) {
      throw new Error(`Batch already exists: ${batch.id}`);
    }
    this.batches.set(batch.id, structuredClone(batch));
  }

  async getBatch(id: string): Promise<BatchRecord | undefined> {
    const batch = this.batches.get(id);
    return batch ? structuredClone(batch) : undefined;
  }

  async updateBatch(batch: BatchRecord): Promise<void> {
    if (!this.batches.has(batch.id)) {
      throw new Error(`Batch not found: ${batch.id}`);
    }
    this.batches.set(batch.id, structuredClone(batch));
  }

  async saveInput(jobId: string, file: FileInput): Promise<void> {
    this.inputs.set(jobId, { ...file, bytes: Buffer.from(file.bytes) });
  }

  async getInput(jobId: string): Promise<FileInput | undefined> {
    const file = this.inputs.get(jobId);
    return file ? { ...file, bytes: Buffer.from(file.bytes) } : undefined;
  }

  async ping(): Promise<void> {
    // Always reachable
  }

  async close(): Promise<void> {
    this.jobs.clear();
    this.batches.clear();
    this.inputs.clear();
  }
}
