/**
 * Classification Errors
 *
 * Every failure the pipeline and the job layer can surface, with a stable
 * code and a retry flag read by the dispatch layer.
 *
 * Usage:
 *   throw new ExtractionFailedError('encrypted', 'PDF is password protected')
 *   job.error = toErrorInfo(error)
 */

import type { ErrorCode, ErrorInfo } from './types';

/**
 * Base class for classification errors.
 */
export abstract class ClassificationError extends Error {
  abstract readonly code: ErrorCode;
  /** Whether the dispatch layer may retry the unit of work */
  readonly isRetriable: boolean = false;
  /** Optional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get reason(): string | undefined {
    return undefined;
  }

  toErrorInfo(): ErrorInfo {
    const reason = this.reason;
    return {
      code: this.code,
      message: this.message,
      ...(reason !== undefined && { reason }),
      retryable: this.isRetriable,
    };
  }
}

/**
 * No extractor is registered for the sniffed media type.
 */
export class UnsupportedFormatError extends ClassificationError {
  readonly code = 'UNSUPPORTED_FORMAT' as const;

  constructor(readonly mediaType: string | undefined) {
    super(
      mediaType
        ? `No extractor registered for media type: ${mediaType}`
        : 'Unable to determine media type from file content',
      { mediaType }
    );
  }

  get reason(): string {
    return this.mediaType ?? 'unrecognized';
  }
}

/**
 * Corrupt, encrypted, empty or otherwise undecodable content.
 */
export class ExtractionFailedError extends ClassificationError {
  readonly code = 'EXTRACTION_FAILED' as const;

  constructor(
    readonly failureReason: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }

  get reason(): string {
    return this.failureReason;
  }
}

/**
 * Industry hint that no strategy is registered for.
 */
export class UnknownIndustryError extends ClassificationError {
  readonly code = 'UNKNOWN_INDUSTRY' as const;

  constructor(readonly industry: string, readonly known: string[] = []) {
    super(`Unknown industry: ${industry}`, { known });
  }

  get reason(): string {
    return this.industry;
  }
}

/**
 * Unexpected failure inside scoring or enhancement.
 */
export class ClassifierError extends ClassificationError {
  readonly code = 'CLASSIFIER_ERROR' as const;
}

/**
 * Queue or store unavailable. The only retriable class.
 */
export class InfrastructureError extends ClassificationError {
  readonly code = 'INFRASTRUCTURE_ERROR' as const;
  readonly isRetriable = true;

  constructor(
    readonly failureReason: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }

  get reason(): string {
    return this.failureReason;
  }
}

export class JobTimeoutError extends ClassificationError {
  readonly code = 'JOB_TIMEOUT' as const;

  constructor(readonly timeoutMs: number) {
    super(`Job exceeded timeout of ${timeoutMs}ms`, { timeoutMs });
  }
}

export class JobCancelledError extends ClassificationError {
  readonly code = 'CANCELLED' as const;

  constructor() {
    super('Job cancelled before it started');
  }
}

export class ExtractorConflictError extends ClassificationError {
  readonly code = 'EXTRACTOR_CONFLICT' as const;

  constructor(readonly mediaType: string, existing: string, incoming: string) {
    super(`Media type ${mediaType} already handled by ${existing}, cannot register ${incoming}`, {
      mediaType,
      existing,
      incoming,
    });
  }
}

export class FileTooLargeError extends ClassificationError {
  readonly code = 'FILE_TOO_LARGE' as const;

  constructor(readonly size: number, readonly limit: number) {
    super(`File size ${size} bytes exceeds limit of ${limit} bytes`, { size, limit });
  }
}

export class ValidationError extends ClassificationError {
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(message: string, readonly errors: string[] = []) {
    super(message, { errors });
  }
}

export class JobNotFoundError extends ClassificationError {
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

export class BatchNotFoundError extends ClassificationError {
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly batchId: string) {
    super(`Batch not found: ${batchId}`);
  }
}

/**
 * Map any thrown value onto the structured error stored on a job.
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof ClassificationError) {
    return error.toErrorInfo();
  }
  return {
    code: 'CLASSIFIER_ERROR',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}

export function isRetriable(error: unknown): boolean {
  return error instanceof ClassificationError && error.isRetriable;
}
