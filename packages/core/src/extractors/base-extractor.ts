/**
 * Base Document Extractor
 *
 * Abstract base class providing the behaviour every extractor shares:
 * empty-input rejection, error mapping, text cleaning and freezing of the
 * produced content.
 */

import type { DocumentFormat, ExtractedContent, FileInput, Table } from '../types';
import type { DocumentExtractor, ExtractionDraft } from './types';
import { ClassificationError, ExtractionFailedError } from '../errors';
import { logger } from '../logger';
import { buildTable, cleanText, deepFreeze, uniqueLines } from './text';

/**
 * Abstract base class for format extractors.
 * Subclasses implement `read()` against their parsing library.
 */
export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly name: string;
  abstract readonly format: DocumentFormat;
  abstract readonly supportedMediaTypes: readonly string[];

  /**
   * Read the raw document. Receives a private copy of the bytes.
   */
  protected abstract read(bytes: Buffer, mediaType: string): Promise<ExtractionDraft>;

  async extract(file: FileInput, mediaType: string): Promise<ExtractedContent> {
    if (file.bytes.length === 0) {
      throw new ExtractionFailedError('empty_file', 'File is empty', {
        extractor: this.name,
      });
    }

    const startTime = Date.now();

    logger.info('Starting extraction', {
      extractor: this.name,
      media_type: mediaType,
      size_bytes: file.bytes.length,
      filename: file.filename,
    });

    let draft: ExtractionDraft;
    try {
      draft = await this.read(Buffer.from(file.bytes), mediaType);
    } catch (error) {
      logger.error('Extraction failed', error, { extractor: this.name, media_type: mediaType });
      if (error instanceof ClassificationError) {
        throw error;
      }
      throw new ExtractionFailedError(
        'corrupt',
        `Failed to extract ${this.format} content: ${error instanceof Error ? error.message : String(error)}`,
        { extractor: this.name }
      );
    }

    const content = this.buildContent(draft, mediaType);

    logger.info('Extraction complete', {
      extractor: this.name,
      media_type: mediaType,
      text_length: content.raw_text.length,
      table_count: content.tables.length,
      page_count: content.page_count,
      duration_ms: Date.now() - startTime,
    });

    return content;
  }

  /**
   * Normalize a draft into frozen ExtractedContent.
   * Content without any text is never returned as valid.
   */
  protected buildContent(draft: ExtractionDraft, mediaType: string): ExtractedContent {
    const rawText = cleanText(draft.text);
    if (!rawText) {
      throw new ExtractionFailedError('no_text', `No text could be extracted from ${this.format} document`, {
        extractor: this.name,
      });
    }

    const tables: Table[] = [];
    for (const rows of draft.tables ?? []) {
      const table = buildTable(rows);
      if (table) tables.push(table);
    }

    const content: ExtractedContent = {
      raw_text: rawText,
      tables,
      headers: uniqueLines(draft.headers ?? []),
      footers: uniqueLines(draft.footers ?? []),
      format: this.format,
      media_type: mediaType,
      ...(draft.pageCount !== undefined && { page_count: draft.pageCount }),
      properties: { ...draft.properties },
    };

    return deepFreeze(content);
  }
}
