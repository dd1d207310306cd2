/**
 * Core Package - Main Export
 */

// Context
export { currentContext, getCorrelationId, withContext, type JobContext } from './context';

// Logger
export { logger, serializeError, type LogContext } from './logger';

// Config
export { config, type Config, type LogLevel } from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Result
export { Ok, Err, type Result } from './result';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ClassifyDocumentJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  jobsReapedCounter,
  documentsClassifiedCounter,
  classificationFailuresCounter,
  confidenceHistogram,
  stageDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateStrategyDefinition,
  validateClassificationResult,
  validateJobRecord,
  validateBatchRecord,
  SCHEMA_FILES,
  type ValidationResult,
} from './schemas';

// Extractors
export * from './extractors';

// Readers
export { PdfjsReader, groupLines, splitBands, PAGE_BAND_RATIO, type PdfReader, type PdfDocument, type PdfPage } from './lib/pdf';
export { MammothDocxReader, type DocxReader, type DocxDocument } from './lib/docx';
export { ExcelJsReader, stripHeaderFooterCodes, type WorkbookReader, type SheetData } from './lib/xlsx';
export { TesseractOcrEngine, bundledLangPath, type OcrEngine, type TesseractOptions } from './lib/ocr';

// Strategies
export * from './strategies';

// Classifier
export * from './classifier';

// Enhancer
export * from './enhancer';

// Pipeline
export { ClassificationPipeline, type PipelineOptions } from './pipeline';

// Jobs
export * from './jobs';

// Service
export {
  ClassificationService,
  createCore,
  type Core,
  type CoreOptions,
  type ServiceDescription,
} from './service';
