/**
 * Logging and Context Tests
 */

import {
  config,
  currentContext,
  logger,
  serializeError,
  withContext,
  ExtractionFailedError,
  type LogLevel,
} from '@doctype/core';

function captured(spy: jest.SpyInstance): Record<string, unknown> {
  const [line] = spy.mock.calls[spy.mock.calls.length - 1];
  if (typeof line !== 'string') throw new Error('expected a log line');
  return JSON.parse(line);
}

describe('withContext', () => {
  it('should nest scopes and keep outer ids', async () => {
    const seen = await withContext({ correlationId: 'corr-1', batchId: 'batch_1' }, async () =>
      withContext({ jobId: 'job_1' }, async () => {
        await Promise.resolve();
        return currentContext();
      })
    );

    expect(seen).toEqual({ correlationId: 'corr-1', jobId: 'job_1', batchId: 'batch_1' });
    expect(currentContext()).toBeUndefined();
  });

  it('should generate a correlation id for a new scope', () => {
    const scope = withContext({ jobId: 'job_2' }, () => currentContext());

    expect(scope?.jobId).toBe('job_2');
    expect(scope?.correlationId).toMatch(/^[0-9A-Z]{26}$/);
  });
});

describe('logger', () => {
  const originalLevel: LogLevel = config.logLevel;
  let info: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    config.logLevel = originalLevel;
    jest.restoreAllMocks();
  });

  it('should write one JSON line with the context ids', () => {
    config.logLevel = 'info';

    withContext({ correlationId: 'corr-9', jobId: 'job_9' }, () => {
      logger.info('Job finished', { state: 'SUCCESS' });
    });

    expect(captured(info)).toMatchObject({
      level: 'INFO',
      correlationId: 'corr-9',
      jobId: 'job_9',
      message: 'Job finished',
      state: 'SUCCESS',
    });
    expect(captured(info)).not.toHaveProperty('batchId');
  });

  it('should drop entries below the configured level', () => {
    config.logLevel = 'warn';

    logger.info('Job submitted');

    expect(info).not.toHaveBeenCalled();
  });

  it('should log classification errors with their code and reason', () => {
    config.logLevel = 'info';

    logger.error('Extraction failed', new ExtractionFailedError('encrypted', 'PDF is password protected'));

    expect(captured(error).error).toEqual({
      name: 'ExtractionFailedError',
      code: 'EXTRACTION_FAILED',
      reason: 'encrypted',
      retryable: false,
      message: 'PDF is password protected',
    });
  });

  it('should serialize values that are not errors', () => {
    expect(serializeError('connection reset')).toEqual({ message: 'connection reset' });
  });
});
