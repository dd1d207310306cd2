/**
 * PDF Extractor
 */

import type { DocumentFormat } from '../types';
import type { ExtractionDraft } from './types';
import { BaseExtractor } from './base-extractor';
import { MEDIA_TYPES } from './media-type';
import { PdfjsReader, type PdfReader } from '../lib/pdf';

export class PdfExtractor extends BaseExtractor {
  readonly name = 'pdf';
  readonly format: DocumentFormat = 'PDF';
  readonly supportedMediaTypes = [MEDIA_TYPES.PDF];

  constructor(private readonly reader: PdfReader = new PdfjsReader()) {
    super();
  }

  protected async read(bytes: Buffer): Promise<ExtractionDraft> {
    const document = await this.reader.read(new Uint8Array(bytes));

    const properties: Record<string, string | number | boolean> = {
      image_count: document.imageCount,
    };
    if (document.title) properties.title = document.title;
    if (document.author) properties.author = document.author;

    return {
      text: document.pages.map((page) => page.lines.join('\n')).join('\n'),
      headers: document.pages.flatMap((page) => page.headers),
      footers: document.pages.flatMap((page) => page.footers),
      pageCount: document.pages.length,
      properties,
    };
  }
}
