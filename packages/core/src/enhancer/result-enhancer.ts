/**
 * Result Enhancer
 *
 * Turns a classification plus the content it came from into the final
 * ClassificationResult: table summaries, format features and metadata.
 * Confidence is passed through untouched.
 */

import type {
  Classification,
  ClassificationResult,
  ContentProperties,
  Enhancement,
  ExtractedContent,
  FormatFeatures,
  TableSummary,
} from '../types';
import { analyzeFooters, analyzeHeaders, classifyTable, countWords, findAmounts, findDates, hasHeaderRow } from './patterns';

/**
 * Facts about the uploaded file rather than its content.
 */
export interface ResultSource {
  fileSize?: number;
  sha256?: string;
  filename?: string;
  /** Copy the cleaned text into metadata.extracted_text */
  includeText?: boolean;
}

function numberProperty(properties: ContentProperties, key: string): number {
  const value = properties[key];
  return typeof value === 'number' ? value : 0;
}

export function summarizeTables(content: ExtractedContent): TableSummary[] {
  return content.tables.map((table, index) => ({
    index,
    rows: table.row_count,
    columns: table.column_count,
    has_header_row: hasHeaderRow(table),
    kind: classifyTable(table),
  }));
}

export function formatFeatures(content: ExtractedContent): FormatFeatures {
  const features: FormatFeatures = {
    has_tables: content.tables.length > 0,
    has_headers: content.headers.length > 0,
    has_footers: content.footers.length > 0,
  };

  switch (content.format) {
    case 'PDF':
    case 'WORD': {
      const imageCount = numberProperty(content.properties, 'image_count');
      features.has_embedded_images = imageCount > 0;
      features.image_count = imageCount;
      break;
    }
    case 'EXCEL': {
      const mergedCells = numberProperty(content.properties, 'merged_cell_count');
      features.has_merged_cells = mergedCells > 0;
      features.merged_cell_count = mergedCells;
      features.sheet_count = numberProperty(content.properties, 'sheet_count');
      break;
    }
    case 'IMAGE':
      features.ocr_applied = true;
      break;
  }

  return features;
}

export class ResultEnhancer {
  enhance(content: ExtractedContent, classification: Classification, source: ResultSource = {}): ClassificationResult {
    const tableSummaries = summarizeTables(content);

    const enhancement: Enhancement = {
      tables_detected: content.tables.length,
      table_summaries: tableSummaries,
      format_features: formatFeatures(content),
    };

    const metadata: Record<string, unknown> = {
      media_type: content.media_type,
      classification_method: classification.method,
      content_length: content.raw_text.length,
      word_count: countWords(content.raw_text),
      dates: findDates(content.raw_text),
      amounts: findAmounts(content.raw_text),
      header_patterns: analyzeHeaders(content.headers),
      footer_patterns: analyzeFooters(content.footers),
      document_properties: { ...content.properties },
    };
    if (content.page_count !== undefined) metadata.page_count = content.page_count;
    if (source.fileSize !== undefined) metadata.file_size = source.fileSize;
    if (source.sha256 !== undefined) metadata.file_sha256 = source.sha256;
    if (source.filename !== undefined) metadata.filename = source.filename;
    if (source.includeText) metadata.extracted_text = content.raw_text;

    return {
      document_type: classification.document_type,
      industry: classification.industry,
      confidence: classification.confidence,
      matched_keywords: { ...classification.matched_keywords },
      metadata,
      enhancement,
    };
  }
}
