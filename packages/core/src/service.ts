/**
 * Classification Service
 *
 * The operations exposed to callers (HTTP adapter, workers, tests), plus the
 * composition root that wires registries, pipeline and job layer together.
 */

import type { BatchJob, ClassificationResult, ErrorInfo, FileInput, Job } from './types';
import { toErrorInfo } from './errors';
import { Err, Ok, type Result } from './result';
import { ExtractorRegistry, createDefaultExtractorRegistry, type ExtractorRegistryOptions } from './extractors/registry';
import { StrategyRegistry, createDefaultStrategyRegistry, type StrategyDescription } from './strategies/registry';
import { KeywordClassifier, type ClassifierOptions } from './classifier/classifier';
import { ResultEnhancer } from './enhancer/result-enhancer';
import { ClassificationPipeline, type PipelineOptions } from './pipeline';
import type { JobStore } from './jobs/store';
import { InMemoryJobStore } from './jobs/store';
import { InProcessWorkQueue, type WorkQueue } from './jobs/work-queue';
import { JobManager, type JobManagerOptions } from './jobs/job-manager';
import { BatchCoordinator, type BatchItem, type BatchResultEntry, type BatchRetry } from './jobs/batch-coordinator';
import { JobReaper, type JobReaperOptions } from './jobs/reaper';

export interface ServiceDescription {
  media_types: Record<string, string>;
  strategies: StrategyDescription[];
}

export class ClassificationService {
  constructor(
    private readonly pipeline: ClassificationPipeline,
    private readonly jobs: JobManager,
    private readonly batches: BatchCoordinator,
    private readonly extractors: ExtractorRegistry,
    private readonly strategies: StrategyRegistry
  ) {}

  /**
   * Run the whole pipeline in the caller's request.
   * Failures come back as values, never thrown.
   */
  async classifySync(file: FileInput, industry?: string): Promise<Result<ClassificationResult, ErrorInfo>> {
    try {
      return Ok(await this.pipeline.run(file, industry));
    } catch (error) {
      return Err(toErrorInfo(error));
    }
  }

  /**
   * @returns the job id
   * @throws UnknownIndustryError / FileTooLargeError for bad input
   */
  async classifyAsync(file: FileInput, industry?: string): Promise<string> {
    const job = await this.jobs.submit(file, industry);
    return job.id;
  }

  async getStatus(jobId: string): Promise<Job> {
    return this.jobs.status(jobId);
  }

  /**
   * @returns the batch id
   */
  async submitBatch(items: readonly BatchItem[], industry?: string): Promise<string> {
    const batch = await this.batches.submitBatch(items, industry);
    return batch.id;
  }

  async getBatchStatus(batchId: string): Promise<BatchJob> {
    return this.batches.status(batchId);
  }

  async cancelBatch(batchId: string): Promise<string[]> {
    return this.batches.cancel(batchId);
  }

  /**
   * Resubmit the batch's failed and cancelled members.
   */
  async retryBatch(batchId: string): Promise<BatchRetry> {
    return this.batches.retry(batchId);
  }

  async getBatchResults(batchId: string): Promise<BatchResultEntry[]> {
    return this.batches.results(batchId);
  }

  describe(): ServiceDescription {
    return {
      media_types: this.extractors.describe(),
      strategies: this.strategies.describe(),
    };
  }
}

// ============================================================================
// Composition root
// ============================================================================

export interface CoreOptions {
  extractors?: ExtractorRegistry;
  extractorOptions?: ExtractorRegistryOptions;
  strategies?: StrategyRegistry;
  classifier?: ClassifierOptions;
  pipeline?: PipelineOptions;
  jobs?: JobManagerOptions;
  reaper?: JobReaperOptions;
  maxBatchSize?: number;
  /** Defaults to an InMemoryJobStore */
  store?: JobStore;
  /** Defaults to an InProcessWorkQueue */
  queue?: WorkQueue;
  /** Register JobManager.execute as the queue's handler (default true) */
  processJobs?: boolean;
}

export interface Core {
  service: ClassificationService;
  pipeline: ClassificationPipeline;
  jobs: JobManager;
  batches: BatchCoordinator;
  reaper: JobReaper;
  store: JobStore;
  queue: WorkQueue;
  extractors: ExtractorRegistry;
  strategies: StrategyRegistry;
  close(): Promise<void>;
}

export function createCore(options: CoreOptions = {}): Core {
  const extractors = options.extractors ?? createDefaultExtractorRegistry(options.extractorOptions);
  const strategies = options.strategies ?? createDefaultStrategyRegistry();
  const classifier = new KeywordClassifier(strategies, options.classifier);
  const pipeline = new ClassificationPipeline(extractors, strategies, classifier, new ResultEnhancer(), options.pipeline);

  const store = options.store ?? new InMemoryJobStore();
  const queue = options.queue ?? new InProcessWorkQueue();
  const jobs = new JobManager(store, queue, pipeline, options.jobs);
  const batches = new BatchCoordinator(store, jobs, { maxBatchSize: options.maxBatchSize });
  const reaper = new JobReaper(store, { jobTimeoutMs: jobs.jobTimeoutMs, ...options.reaper });

  if (options.processJobs ?? true) {
    queue.process((work) => jobs.execute(work));
  }

  return {
    service: new ClassificationService(pipeline, jobs, batches, extractors, strategies),
    pipeline,
    jobs,
    batches,
    reaper,
    store,
    queue,
    extractors,
    strategies,
    async close() {
      reaper.stop();
      await queue.close();
      await store.close();
    },
  };
}
