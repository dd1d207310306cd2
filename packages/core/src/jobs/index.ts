export type { JobStore } from './store';
export { InMemoryJobStore } from './store';
export { RedisJobStore, type RedisJobStoreOptions } from './redis-store';
export {
  InProcessWorkQueue,
  BullWorkQueue,
  toPayload,
  fromPayload,
  type InProcessWorkQueueOptions,
  type WorkHandler,
  type WorkItem,
  type WorkQueue,
  type WorkRequest,
} from './work-queue';
export { JobManager, newJobId, withTimeout, type JobManagerOptions, type SubmitOptions } from './job-manager';
export { JobReaper, type JobReaperOptions } from './reaper';
export {
  BatchCoordinator,
  countStates,
  deriveBatchState,
  type BatchCoordinatorOptions,
  type BatchItem,
  type BatchResultEntry,
  type BatchRetry,
} from './batch-coordinator';
