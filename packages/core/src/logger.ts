/**
 * Structured Logging
 *
 * One JSON object per line. Entries carry the correlation, job and batch ids
 * of the surrounding context; `config.logLevel` sets the threshold.
 */

import { currentContext, getCorrelationId } from './context';
import { ClassificationError } from './errors';
import { config, type LogLevel } from './config';

export interface LogContext {
  [key: string]: unknown;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Classification errors keep their code and reason so failed jobs can be
 * matched to log lines.
 */
export function serializeError(error: unknown): LogContext {
  if (error instanceof ClassificationError) {
    return {
      name: error.name,
      code: error.code,
      ...(error.reason !== undefined && { reason: error.reason }),
      retryable: error.isRetriable,
      message: error.message,
      ...(error.context !== undefined && { context: error.context }),
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (SEVERITY[level] < SEVERITY[config.logLevel]) return;

  const scope = currentContext();
  WRITERS[level](
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      correlationId: scope?.correlationId ?? getCorrelationId(),
      jobId: scope?.jobId,
      batchId: scope?.batchId,
      message,
      ...context,
    })
  );
}

export const logger = {
  debug: (message: string, context?: LogContext) => write('debug', message, context),
  info: (message: string, context?: LogContext) => write('info', message, context),
  warn: (message: string, context?: LogContext) => write('warn', message, context),
  error: (message: string, error?: unknown, context?: LogContext) =>
    write('error', message, { ...context, error: serializeError(error) }),
};
