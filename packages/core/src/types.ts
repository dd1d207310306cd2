/**
 * Shared TypeScript Types
 *
 * Types for the document classification pipeline and the job/batch layer,
 * matching the JSON schemas in docs/contracts/
 */

// ============================================================================
// Input
// ============================================================================

/**
 * Raw uploaded file. The filename is informational only; format detection
 * always goes through the bytes.
 */
export interface FileInput {
  bytes: Buffer;
  filename?: string;
}

// ============================================================================
// Extracted Content
// ============================================================================

export type DocumentFormat = 'PDF' | 'WORD' | 'EXCEL' | 'IMAGE';

export interface Table {
  rows: string[][];
  row_count: number;
  column_count: number;
}

/** Extractor-observed facts (image counts, merged cells, document info). */
export type ContentProperties = Record<string, string | number | boolean>;

export interface ExtractedContent {
  raw_text: string;
  tables: Table[];
  /** Unique header strings in first-seen order */
  headers: string[];
  /** Unique footer strings in first-seen order */
  footers: string[];
  format: DocumentFormat;
  media_type: string;
  page_count?: number;
  properties: ContentProperties;
}

// ============================================================================
// Industry Strategies
// ============================================================================

/**
 * Keyword lists and weights for one industry. `scoring_weights` keys are
 * either a document type (weights its whole keyword set) or
 * `keyword:<phrase>` (weights one phrase, taking precedence).
 */
export interface IndustryStrategy {
  industry_name: string;
  description?: string;
  document_types: string[];
  keywords: Record<string, string[]>;
  scoring_weights?: Record<string, number>;
}

// ============================================================================
// Classification
// ============================================================================

export const UNKNOWN_DOCUMENT_TYPE = 'unknown';
export const UNKNOWN_INDUSTRY = 'unknown';

export type ClassificationMethod = 'keyword_matching' | 'below_threshold';

export interface Classification {
  document_type: string;
  industry: string;
  /** Saturated score in [0, 1) */
  confidence: number;
  matched_keywords: Record<string, number>;
  method: ClassificationMethod;
}

export type TableKind = 'financial' | 'list' | 'form' | 'generic';

export interface TableSummary {
  index: number;
  rows: number;
  columns: number;
  has_header_row: boolean;
  kind: TableKind;
}

export type FormatFeatures = Record<string, boolean | number>;

export interface Enhancement {
  tables_detected: number;
  table_summaries: TableSummary[];
  format_features: FormatFeatures;
}

export interface ClassificationResult {
  document_type: string;
  industry: string;
  confidence: number;
  matched_keywords: Record<string, number>;
  metadata: Record<string, unknown>;
  enhancement: Enhancement;
}

// ============================================================================
// Errors
// ============================================================================

export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'UNKNOWN_INDUSTRY'
  | 'CLASSIFIER_ERROR'
  | 'INFRASTRUCTURE_ERROR'
  | 'JOB_TIMEOUT'
  | 'CANCELLED'
  | 'FILE_TOO_LARGE'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'EXTRACTOR_CONFLICT';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  reason?: string;
  retryable: boolean;
}

// ============================================================================
// Jobs & Batches
// ============================================================================

export type JobState = 'PENDING' | 'RUNNING' | 'SUCCESS' | 'FAILURE';

export const TERMINAL_JOB_STATES: readonly JobState[] = ['SUCCESS', 'FAILURE'];

export function isTerminal(state: JobState): boolean {
  return TERMINAL_JOB_STATES.includes(state);
}

export interface Job {
  id: string;
  state: JobState;
  industry?: string;
  filename?: string;
  batch_id?: string;
  /** Dispatch attempts that reached RUNNING */
  attempts: number;
  result?: ClassificationResult;
  error?: ErrorInfo;
  created_at: string;
  started_at?: string;
  finished_at?: string;
}

export type BatchState = 'PENDING' | 'RUNNING' | 'PARTIAL' | 'SUCCESS' | 'FAILURE';

export interface BatchRecord {
  id: string;
  member_job_ids: string[];
  created_at: string;
}

export interface BatchJob extends BatchRecord {
  state: BatchState;
  counts: Record<JobState, number>;
}
