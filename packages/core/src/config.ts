/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  logLevel: LogLevel;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Job lifecycle
  jobTimeoutMs: number;
  reaperIntervalMs: number;
  reaperGraceMs: number;
  jobRetentionSeconds: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Input limits
  maxFileSizeBytes: number;
  maxBatchSize: number;

  // Classifier policy
  saturationK: number;
  minConfidence: number;

  // OCR
  ocrLanguage: string;
  ocrMinChars: number;
  ocrLangPath: string | undefined;
  ocrCachePath: string | undefined;

  // Ports
  apiPort: number;
  workerMetricsPort: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value?.toLowerCase());
  return level ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config: Config = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  maxJobAttempts: parseInt(process.env.MAX_JOB_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Job lifecycle
  jobTimeoutMs: parseInt(process.env.JOB_TIMEOUT_MS || '300000', 10),
  reaperIntervalMs: parseInt(process.env.REAPER_INTERVAL_MS || '30000', 10),
  reaperGraceMs: parseInt(process.env.REAPER_GRACE_MS || '60000', 10),
  jobRetentionSeconds: parseInt(process.env.JOB_RETENTION_SECONDS || '86400', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '5000', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '10000', 10),

  // Input limits
  maxFileSizeBytes: parseInt(process.env.MAX_FILE_SIZE_BYTES || String(50 * 1024 * 1024), 10),
  maxBatchSize: parseInt(process.env.MAX_BATCH_SIZE || '1000', 10),

  // Classifier policy
  saturationK: parseNumber(process.env.CLASSIFIER_SATURATION_K, 4),
  minConfidence: parseNumber(process.env.CLASSIFIER_MIN_CONFIDENCE, 0.25),

  // OCR
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  ocrMinChars: parseInt(process.env.OCR_MIN_CHARS || '3', 10),
  ocrLangPath: process.env.OCR_LANG_PATH || undefined,
  ocrCachePath: process.env.OCR_CACHE_PATH || undefined,

  // Ports
  apiPort: parseInt(process.env.PORT || '8080', 10),
  workerMetricsPort: parseInt(process.env.WORKER_METRICS_PORT || '9464', 10),
};
