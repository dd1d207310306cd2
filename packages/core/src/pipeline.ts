/**
 * Classification Pipeline
 *
 * extraction → classification → enhancement for a single file. Shared by the
 * synchronous path and the job workers.
 */

import { createHash } from 'node:crypto';
import type { ClassificationResult, FileInput } from './types';
import { FileTooLargeError, toErrorInfo, ValidationError } from './errors';
import type { ExtractorRegistry } from './extractors/registry';
import type { StrategyRegistry } from './strategies/registry';
import type { KeywordClassifier } from './classifier/classifier';
import type { ResultEnhancer } from './enhancer/result-enhancer';
import { validateClassificationResult } from './schemas';
import { logger } from './logger';
import { config } from './config';
import {
  classificationFailuresCounter,
  confidenceHistogram,
  documentsClassifiedCounter,
  stageDurationHistogram,
} from './metrics';

export interface PipelineOptions {
  maxFileSizeBytes?: number;
  /** Copy the cleaned text into result metadata */
  includeText?: boolean;
}

export class ClassificationPipeline {
  readonly maxFileSizeBytes: number;
  private readonly includeText: boolean;

  constructor(
    private readonly extractors: ExtractorRegistry,
    private readonly strategies: StrategyRegistry,
    private readonly classifier: KeywordClassifier,
    private readonly enhancer: ResultEnhancer,
    options: PipelineOptions = {}
  ) {
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? config.maxFileSizeBytes;
    this.includeText = options.includeText ?? false;
  }

  /**
   * Caller-input checks that run before any work is accepted.
   *
   * @throws UnknownIndustryError for an unregistered industry hint
   * @throws FileTooLargeError above the size limit
   */
  validate(file: FileInput, industry?: string): void {
    if (industry !== undefined) {
      // Throws UnknownIndustryError
      this.strategies.strategiesFor(industry);
    }
    if (file.bytes.length > this.maxFileSizeBytes) {
      throw new FileTooLargeError(file.bytes.length, this.maxFileSizeBytes);
    }
  }

  async run(file: FileInput, industry?: string): Promise<ClassificationResult> {
    const startTime = Date.now();

    try {
      this.validate(file, industry);

      const resolved = await this.extractors.resolve(file);
      const format = resolved.extractor.format;

      const extractTimer = stageDurationHistogram.startTimer({ stage: 'extract', format });
      const content = await resolved.extractor.extract(file, resolved.mediaType);
      extractTimer();

      const classifyTimer = stageDurationHistogram.startTimer({ stage: 'classify', format });
      const classification = this.classifier.classify(content, industry);
      classifyTimer();

      const enhanceTimer = stageDurationHistogram.startTimer({ stage: 'enhance', format });
      const result = this.enhancer.enhance(content, classification, {
        fileSize: file.bytes.length,
        sha256: createHash('sha256').update(file.bytes).digest('hex'),
        filename: file.filename,
        includeText: this.includeText,
      });
      enhanceTimer();

      const validation = validateClassificationResult(result);
      if (!validation.valid) {
        throw new ValidationError('Classification result failed schema validation', validation.errors);
      }

      documentsClassifiedCounter.inc({
        industry: result.industry,
        document_type: result.document_type,
        format,
      });
      confidenceHistogram.observe({ industry: result.industry }, result.confidence);

      logger.info('Document classified', {
        filename: file.filename,
        media_type: resolved.mediaType,
        industry: result.industry,
        document_type: result.document_type,
        confidence: result.confidence,
        duration_ms: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      const info = toErrorInfo(error);
      classificationFailuresCounter.inc({ error_code: info.code });
      logger.warn('Classification failed', {
        filename: file.filename,
        code: info.code,
        reason: info.reason,
        message: info.message,
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }
}
