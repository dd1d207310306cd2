/**
 * Word Extractor
 *
 * Text comes from mammoth's raw extraction; tables and images are recovered
 * from its HTML rendering.
 */

import type { DocumentFormat } from '../types';
import type { ExtractionDraft } from './types';
import { BaseExtractor } from './base-extractor';
import { MEDIA_TYPES } from './media-type';
import { MammothDocxReader, type DocxReader } from '../lib/docx';
import { logger } from '../logger';

const TABLE_PATTERN = /<table(?:\s[^>]*)?>([\s\S]*?)<\/table>/gi;
const ROW_PATTERN = /<tr(?:\s[^>]*)?>([\s\S]*?)<\/tr>/gi;
const CELL_PATTERN = /<t[dh](?:\s[^>]*)?>([\s\S]*?)<\/t[dh]>/gi;
const IMAGE_PATTERN = /<img\b/gi;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function htmlToText(fragment: string): string {
  return decodeEntities(fragment.replace(/<br\s*\/?>/gi, ' ').replace(/<[^>]+>/g, ' '));
}

/**
 * Parse the tables out of mammoth's HTML. Nested tables are not expected:
 * mammoth flattens them.
 */
export function parseHtmlTables(html: string): string[][][] {
  const tables: string[][][] = [];

  for (const tableMatch of html.matchAll(TABLE_PATTERN)) {
    const rows: string[][] = [];
    for (const rowMatch of tableMatch[1].matchAll(ROW_PATTERN)) {
      const cells = Array.from(rowMatch[1].matchAll(CELL_PATTERN), (cell) => htmlToText(cell[1]));
      if (cells.length > 0) rows.push(cells);
    }
    if (rows.length > 0) tables.push(rows);
  }

  return tables;
}

export class WordExtractor extends BaseExtractor {
  readonly name = 'word';
  readonly format: DocumentFormat = 'WORD';
  readonly supportedMediaTypes = [MEDIA_TYPES.DOCX];

  constructor(private readonly reader: DocxReader = new MammothDocxReader()) {
    super();
  }

  protected async read(bytes: Buffer): Promise<ExtractionDraft> {
    const document = await this.reader.read(bytes);

    if (document.warnings.length > 0) {
      logger.debug('DOCX conversion warnings', { warnings: document.warnings });
    }

    return {
      text: document.text,
      tables: parseHtmlTables(document.html),
      properties: {
        image_count: (document.html.match(IMAGE_PATTERN) ?? []).length,
      },
    };
  }
}
