/**
 * Image Extractor
 *
 * Scanned documents and photos go through OCR. Recognised text that is
 * mostly noise is rejected rather than classified.
 */

import type { DocumentFormat } from '../types';
import type { ExtractionDraft } from './types';
import { BaseExtractor } from './base-extractor';
import { MEDIA_TYPES } from './media-type';
import { TesseractOcrEngine, type OcrEngine } from '../lib/ocr';
import { ExtractionFailedError } from '../errors';
import { countAlphanumeric } from './text';
import { config } from '../config';

/** Minimum share of letters and digits among non-whitespace OCR output */
export const MIN_ALPHANUMERIC_RATIO = 0.1;

export interface ImageExtractorOptions {
  engine?: OcrEngine;
  minChars?: number;
}

export class ImageExtractor extends BaseExtractor {
  readonly name = 'image';
  readonly format: DocumentFormat = 'IMAGE';
  readonly supportedMediaTypes = [MEDIA_TYPES.PNG, MEDIA_TYPES.JPEG, MEDIA_TYPES.TIFF, MEDIA_TYPES.BMP];

  private readonly engine: OcrEngine;
  private readonly minChars: number;

  constructor(options: ImageExtractorOptions = {}) {
    super();
    this.engine = options.engine ?? new TesseractOcrEngine(config.ocrLanguage);
    this.minChars = options.minChars ?? config.ocrMinChars;
  }

  protected async read(bytes: Buffer): Promise<ExtractionDraft> {
    const text = await this.engine.recognize(bytes);

    const visible = text.replace(/\s+/g, '');
    const alphanumeric = countAlphanumeric(visible);
    if (alphanumeric < this.minChars || alphanumeric / Math.max(visible.length, 1) < MIN_ALPHANUMERIC_RATIO) {
      throw new ExtractionFailedError('ocr_no_text', 'OCR produced no usable text', {
        extractor: this.name,
        alphanumeric_chars: alphanumeric,
      });
    }

    return {
      text,
      pageCount: 1,
      properties: { ocr_applied: true },
    };
  }
}
