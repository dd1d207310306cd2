/**
 * Job Context
 *
 * AsyncLocalStorage scope naming the request and, on the worker side, the
 * job and batch being processed. Scopes nest: an inner scope keeps the ids
 * of the outer one unless it sets its own.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface JobContext {
  correlationId: string;
  jobId?: string;
  batchId?: string;
}

const storage = new AsyncLocalStorage<JobContext>();

export function currentContext(): JobContext | undefined {
  return storage.getStore();
}

/**
 * Correlation ID of the current scope, or a fresh one outside any scope
 */
export function getCorrelationId(): string {
  return storage.getStore()?.correlationId || ulid();
}

/**
 * Run `fn` in a scope extending the current one. Works for sync and async
 * functions alike; an async `fn` keeps the scope across its awaits.
 */
export function withContext<T>(fields: Partial<JobContext>, fn: () => T): T {
  const parent = storage.getStore();
  const jobId = fields.jobId ?? parent?.jobId;
  const batchId = fields.batchId ?? parent?.batchId;

  const scope: JobContext = {
    correlationId: fields.correlationId ?? parent?.correlationId ?? ulid(),
    ...(jobId !== undefined && { jobId }),
    ...(batchId !== undefined && { batchId }),
  };
  return storage.run(scope, fn);
}
