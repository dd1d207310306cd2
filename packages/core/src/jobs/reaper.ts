/**
 * Job Reaper
 *
 * A worker that dies after claiming a job leaves it RUNNING forever. The
 * reaper fails such jobs once they are older than the job timeout plus a
 * grace period.
 */

import type { Job } from '../types';
import type { JobStore } from './store';
import { JobTimeoutError } from '../errors';
import { jobsProcessedCounter, jobsReapedCounter } from '../metrics';
import { logger } from '../logger';
import { config } from '../config';

export interface JobReaperOptions {
  jobTimeoutMs?: number;
  graceMs?: number;
  intervalMs?: number;
}

export class JobReaper {
  private readonly jobTimeoutMs: number;
  private readonly graceMs: number;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | undefined;

  constructor(private readonly store: JobStore, options: JobReaperOptions = {}) {
    this.jobTimeoutMs = options.jobTimeoutMs ?? config.jobTimeoutMs;
    this.graceMs = options.graceMs ?? config.reaperGraceMs;
    this.intervalMs = options.intervalMs ?? config.reaperIntervalMs;
  }

  /**
   * Fail every RUNNING job started before `now - (timeout + grace)`.
   *
   * @returns ids of the jobs this pass failed
   */
  async reap(now: Date = new Date()): Promise<string[]> {
    const cutoff = new Date(now.getTime() - this.jobTimeoutMs - this.graceMs);
    const stale = await this.store.listRunningSince(cutoff);
    const reaped: string[] = [];

    for (const job of stale) {
      const failed: Job = {
        ...job,
        state: 'FAILURE',
        error: new JobTimeoutError(this.jobTimeoutMs).toErrorInfo(),
        finished_at: now.toISOString(),
      };
      // Loses against a worker that finished or resumed the job in the meantime
      if (await this.store.transitionJob(job.id, 'RUNNING', failed, job.attempts)) {
        reaped.push(job.id);
        jobsReapedCounter.inc();
        jobsProcessedCounter.inc({ status: 'FAILURE', error_code: 'JOB_TIMEOUT' });
      }
    }

    if (reaped.length > 0) {
      logger.warn('Reaped stale jobs', { count: reaped.length, job_ids: reaped });
    }
    return reaped;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.reap().catch((err: unknown) => {
        logger.error('Reaper pass failed', err);
      });
    }, this.intervalMs);
    this.timer.unref();
    logger.info('Job reaper started', { interval_ms: this.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
