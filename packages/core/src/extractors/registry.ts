/**
 * Extractor Registry
 *
 * Maps sniffed media types to format extractors. Populated at startup,
 * sealed, then only read.
 */

import type { FileInput } from '../types';
import type { DocumentExtractor, ResolvedExtractor } from './types';
import { ExtractionFailedError, ExtractorConflictError, UnsupportedFormatError } from '../errors';
import { logger } from '../logger';
import { sniffMediaType } from './media-type';
import { PdfExtractor } from './pdf-extractor';
import { WordExtractor } from './word-extractor';
import { ExcelExtractor } from './excel-extractor';
import { ImageExtractor } from './image-extractor';
import type { PdfReader } from '../lib/pdf';
import type { DocxReader } from '../lib/docx';
import type { WorkbookReader } from '../lib/xlsx';
import type { OcrEngine } from '../lib/ocr';

export class ExtractorRegistry {
  private readonly byMediaType = new Map<string, DocumentExtractor>();
  private sealed = false;

  /**
   * Register an extractor for every media type it declares.
   *
   * @throws ExtractorConflictError if any of those media types is taken
   */
  register(extractor: DocumentExtractor): void {
    if (this.sealed) {
      throw new Error('Extractor registry is sealed; call reset() before registering');
    }

    for (const mediaType of extractor.supportedMediaTypes) {
      const existing = this.byMediaType.get(mediaType);
      if (existing) {
        throw new ExtractorConflictError(mediaType, existing.name, extractor.name);
      }
    }

    for (const mediaType of extractor.supportedMediaTypes) {
      this.byMediaType.set(mediaType, extractor);
    }

    logger.debug('Registered extractor', {
      extractor: extractor.name,
      format: extractor.format,
      media_types: extractor.supportedMediaTypes,
    });
  }

  /**
   * Select the extractor for a file by its magic bytes.
   */
  async resolve(file: FileInput): Promise<ResolvedExtractor> {
    if (file.bytes.length === 0) {
      throw new ExtractionFailedError('empty_file', 'File is empty');
    }

    const mediaType = await sniffMediaType(file.bytes);
    const extractor = mediaType ? this.byMediaType.get(mediaType) : undefined;
    if (!mediaType || !extractor) {
      throw new UnsupportedFormatError(mediaType);
    }

    return { extractor, mediaType };
  }

  supportedMediaTypes(): string[] {
    return Array.from(this.byMediaType.keys());
  }

  /**
   * Media type → extractor name.
   */
  describe(): Record<string, string> {
    const description: Record<string, string> = {};
    for (const [mediaType, extractor] of this.byMediaType) {
      description[mediaType] = extractor.name;
    }
    return description;
  }

  getStats(): { totalExtractors: number; byFormat: Record<string, number>; mediaTypes: string[] } {
    const extractors = new Set(this.byMediaType.values());
    const byFormat: Record<string, number> = {};

    for (const extractor of extractors) {
      byFormat[extractor.format] = (byFormat[extractor.format] || 0) + 1;
    }

    return {
      totalExtractors: extractors.size,
      byFormat,
      mediaTypes: this.supportedMediaTypes(),
    };
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Clear all registrations and unseal.
   * Useful for testing.
   */
  reset(): void {
    this.byMediaType.clear();
    this.sealed = false;
  }
}

export interface ExtractorRegistryOptions {
  pdfReader?: PdfReader;
  docxReader?: DocxReader;
  workbookReader?: WorkbookReader;
  ocrEngine?: OcrEngine;
  ocrMinChars?: number;
}

/**
 * Build and seal a registry with the PDF, Word, Excel and image extractors.
 */
export function createDefaultExtractorRegistry(options: ExtractorRegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();

  registry.register(new PdfExtractor(options.pdfReader));
  registry.register(new WordExtractor(options.docxReader));
  registry.register(new ExcelExtractor(options.workbookReader));
  registry.register(new ImageExtractor({ engine: options.ocrEngine, minChars: options.ocrMinChars }));

  registry.seal();
  return registry;
}
