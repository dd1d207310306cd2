/**
 * Document Extractor Types
 *
 * Each extractor turns one family of file formats into the normalized
 * ExtractedContent model consumed by the classifier.
 */

import type { ContentProperties, DocumentFormat, ExtractedContent, FileInput } from '../types';

/**
 * Interface for format-specific extractors.
 */
export interface DocumentExtractor {
  /** Stable name used in logs and registry descriptions */
  readonly name: string;

  /** The content format this extractor produces */
  readonly format: DocumentFormat;

  /** Media types this extractor accepts (matched against sniffed bytes) */
  readonly supportedMediaTypes: readonly string[];

  /**
   * Extract normalized content. Never mutates `file.bytes`.
   *
   * @throws ExtractionFailedError for empty, corrupt, encrypted or
   *   text-less input
   */
  extract(file: FileInput, mediaType: string): Promise<ExtractedContent>;
}

/**
 * Unnormalized output of a format reader, before cleaning and freezing.
 */
export interface ExtractionDraft {
  text: string;
  /** Tables as rows of cell strings */
  tables?: string[][][];
  headers?: string[];
  footers?: string[];
  pageCount?: number;
  properties?: ContentProperties;
}

/**
 * An extractor selected for a file, with the media type that selected it.
 */
export interface ResolvedExtractor {
  extractor: DocumentExtractor;
  mediaType: string;
}
