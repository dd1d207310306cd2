/**
 * Redis Job Store
 *
 * Jobs, batches and retained inputs as JSON strings with a retention TTL. Transitions run as
 * a Lua script so the state check and the write are atomic. A sorted set of
 * RUNNING job ids scored by start time feeds the reaper.
 */

import Redis from 'ioredis';
import type { BatchRecord, FileInput, Job, JobState } from '../types';
import type { JobStore } from './store';
import { InfrastructureError } from '../errors';
import { validateBatchRecord, validateJobRecord } from '../schemas';
import { config } from '../config';
import { logger } from '../logger';

const KEY_PREFIX = 'doctype';
const jobKey = (id: string) => `${KEY_PREFIX}:job:${id}`;
const batchKey = (id: string) => `${KEY_PREFIX}:batch:${id}`;
const inputKey = (id: string) => `${KEY_PREFIX}:input:${id}`;
const RUNNING_KEY = `${KEY_PREFIX}:jobs:running`;

// KEYS[1] job key, KEYS[2] running set
// ARGV[1] expected state, ARGV[2] next JSON, ARGV[3] next state,
// ARGV[4] started_at ms, ARGV[5] job id, ARGV[6] expected attempts or ''
const TRANSITION_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then
  return 0
end
local decoded = cjson.decode(current)
if decoded['state'] ~= ARGV[1] then
  return 0
end
if ARGV[6] ~= '' and decoded['attempts'] ~= tonumber(ARGV[6]) then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2], 'KEEPTTL')
if ARGV[3] == 'RUNNING' then
  redis.call('ZADD', KEYS[2], ARGV[4], ARGV[5])
else
  redis.call('ZREM', KEYS[2], ARGV[5])
end
return 1
`;

interface StoredInput {
  filename?: string;
  content_base64: string;
}

function isStoredInput(value: unknown): value is StoredInput {
  return (
    typeof value === 'object' &&
    value !== null &&
    'content_base64' in value &&
    typeof value.content_base64 === 'string' &&
    (!('filename' in value) || typeof value.filename === 'string')
  );
}

export interface RedisJobStoreOptions {
  client?: Redis;
  retentionSeconds?: number;
}

export class RedisJobStore implements JobStore {
  private readonly redis: Redis;
  private readonly retentionSeconds: number;

  constructor(options: RedisJobStoreOptions = {}) {
    this.redis =
      options.client ??
      new Redis(config.redisUrl, {
        maxRetriesPerRequest: 2,
        lazyConnect: true,
      });
    this.retentionSeconds = options.retentionSeconds ?? config.jobRetentionSeconds;

    this.redis.on('error', (err) => {
      logger.error('Redis job store connection error', err);
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new InfrastructureError(
        'store_unavailable',
        `Job store ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        { operation }
      );
    }
  }

  private parseJob(raw: string | null): Job | undefined {
    if (raw === null) return undefined;
    const validation = validateJobRecord(JSON.parse(raw));
    if (!validation.valid) {
      throw new InfrastructureError('store_corrupt', 'Stored job record is malformed', {
        errors: validation.errors,
      });
    }
    return validation.data;
  }

  async createJob(job: Job): Promise<void> {
    const created = await this.call('createJob', () =>
      this.redis.set(jobKey(job.id), JSON.stringify(job), 'EX', this.retentionSeconds, 'NX')
    );
    if (created !== 'OK') {
      throw new Error(`Job already exists: ${job.id}`);
    }
  }

  async getJob(id: string): Promise<Job | undefined> {
    const raw = await this.call('getJob', () => this.redis.get(jobKey(id)));
    return this.parseJob(raw);
  }

  async getJobs(ids: readonly string[]): Promise<Array<Job | undefined>> {
    if (ids.length === 0) return [];
    const raws = await this.call('getJobs', () => this.redis.mget(ids.map(jobKey)));
    return raws.map((raw) => this.parseJob(raw));
  }

  async transitionJob(id: string, expected: JobState, next: Job, expectedAttempts?: number): Promise<boolean> {
    if (next.id !== id) {
      throw new Error(`Transition target ${next.id} does not match job ${id}`);
    }
    const startedAt = next.started_at ? Date.parse(next.started_at) : Date.now();
    const applied = await this.call('transitionJob', () =>
      this.redis.eval(
        TRANSITION_SCRIPT,
        2,
        jobKey(id),
        RUNNING_KEY,
        expected,
        JSON.stringify(next),
        next.state,
        String(startedAt),
        id,
        expectedAttempts === undefined ? '' : String(expectedAttempts)
      )
    );
    return applied === 1;
  }

  async listRunningSince(before: Date): Promise<Job[]> {
    const ids = await this.call('listRunningSince', () =>
      this.redis.zrangebyscore(RUNNING_KEY, '-inf', `(${before.getTime()}`)
    );
    const jobs = await this.getJobs(ids);
    return jobs.filter((job): job is Job => job !== undefined && job.state === 'RUNNING');
  }

  async createBatch(batch: BatchRecord): Promise<void> {
    await this.call('createBatch', () =>
      this.redis.set(batchKey(batch.id), JSON.stringify(batch), 'EX', this.retentionSeconds)
    );
  }

  async getBatch(id: string): Promise<BatchRecord | undefined> {
    const raw = await this.call('getBatch', () => this.redis.get(batchKey(id)));
    if (raw === null) return undefined;
    const validation = validateBatchRecord(JSON.parse(raw));
    if (!validation.valid) {
      throw new InfrastructureError('store_corrupt', 'Stored batch record is malformed', {
        errors: validation.errors,
      });
    }
    return validation.data;
  }

  async updateBatch(batch: BatchRecord): Promise<void> {
    const updated = await this.call('updateBatch', () =>
      this.redis.set(batchKey(batch.id), JSON.stringify(batch), 'KEEPTTL', 'XX')
    );
    if (updated !== 'OK') {
      throw new Error(`Batch not found: ${batch.id}`);
    }
  }

  async saveInput(jobId: string, file: FileInput): Promise<void> {
    const stored: StoredInput = {
      ...(file.filename !== undefined && { filename: file.filename }),
      content_base64: file.bytes.toString('base64'),
    };
    await this.call('saveInput', () =>
      this.redis.set(inputKey(jobId), JSON.stringify(stored), 'EX', this.retentionSeconds)
    );
  }

  async getInput(jobId: string): Promise<FileInput | undefined> {
    const raw = await this.call('getInput', () => this.redis.get(inputKey(jobId)));
    if (raw === null) return undefined;
    const stored: unknown = JSON.parse(raw);
    if (!isStoredInput(stored)) {
      throw new InfrastructureError('store_corrupt', 'Stored job input is malformed', { jobId });
    }
    return {
      bytes: Buffer.from(stored.content_base64, 'base64'),
      ...(stored.filename !== undefined && { filename: stored.filename }),
    };
  }

  async ping(): Promise<void> {
    await this.call('ping', () => this.redis.ping());
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
