/**
 * Document Extractors Module
 *
 * One extractor per file format family, selected by sniffed media type.
 */

export type { DocumentExtractor, ExtractionDraft, ResolvedExtractor } from './types';

export { BaseExtractor } from './base-extractor';
export { PdfExtractor } from './pdf-extractor';
export { WordExtractor, parseHtmlTables } from './word-extractor';
export { ExcelExtractor, splitSheetTables, MIN_TABLE_ROWS } from './excel-extractor';
export { ImageExtractor, MIN_ALPHANUMERIC_RATIO, type ImageExtractorOptions } from './image-extractor';

export {
  ExtractorRegistry,
  createDefaultExtractorRegistry,
  type ExtractorRegistryOptions,
} from './registry';

export { MEDIA_TYPES, sniffMediaType, type KnownMediaType } from './media-type';
export { cleanText, cleanCell, uniqueLines, buildTable, countAlphanumeric, deepFreeze } from './text';
