/**
 * PDF Text Extraction
 *
 * Reads PDF files using pdfjs-dist, rebuilding line structure and separating
 * the header and footer bands of each page.
 */

import path from 'path';
import { ExtractionFailedError } from '../errors';
import { logger } from '../logger';

/** Fraction of the page height treated as header (top) or footer (bottom) */
export const PAGE_BAND_RATIO = 0.1;

export interface PdfPage {
  pageNumber: number;
  /** All lines of the page, top to bottom */
  lines: string[];
  headers: string[];
  footers: string[];
}

export interface PdfDocument {
  pages: PdfPage[];
  imageCount: number;
  title?: string;
  author?: string;
}

/**
 * Reader seam so extractors can be exercised without real PDF bytes.
 */
export interface PdfReader {
  read(data: Uint8Array): Promise<PdfDocument>;
}

interface PositionedText {
  x: number;
  y: number;
  str: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (!isRecord(info)) return undefined;
  const value = info[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Group text items by Y position to preserve line structure.
 * Returns lines top to bottom, each with its rounded Y coordinate.
 */
export function groupLines(items: PositionedText[]): Array<{ y: number; text: string }> {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(item.y);
    const x = Math.round(item.x);
    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // PDF user space grows upwards, so descending Y is top to bottom
  return Array.from(itemsByY.entries())
    .sort(([a], [b]) => b - a)
    .map(([y, lineItems]) => ({
      y,
      text: lineItems
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim(),
    }))
    .filter((line) => line.text.length > 0);
}

/**
 * Split grouped lines into header, body and footer bands.
 */
export function splitBands(
  lines: Array<{ y: number; text: string }>,
  pageHeight: number
): { headers: string[]; footers: string[] } {
  const headerFloor = pageHeight * (1 - PAGE_BAND_RATIO);
  const footerCeiling = pageHeight * PAGE_BAND_RATIO;

  return {
    headers: lines.filter((line) => line.y >= headerFloor).map((line) => line.text),
    footers: lines.filter((line) => line.y <= footerCeiling).map((line) => line.text),
  };
}

/**
 * Default reader backed by pdfjs-dist. The library is loaded on first use.
 */
export class PdfjsReader implements PdfReader {
  async read(data: Uint8Array): Promise<PdfDocument> {
    const pdfjsLib = await import('pdfjs-dist');

    // Configure worker for Node.js environment
    pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
      path.dirname(require.resolve('pdfjs-dist/package.json')),
      'build/pdf.worker.js'
    );

    const pdf = await pdfjsLib
      .getDocument({ data, isEvalSupported: false, useSystemFonts: true })
      .promise.catch((error: unknown) => {
        if (error instanceof Error && error.name === 'PasswordException') {
          throw new ExtractionFailedError('encrypted', 'PDF is password protected');
        }
        throw error;
      });

    try {
      const imageOps = new Set<number>([
        pdfjsLib.OPS.paintImageXObject,
        pdfjsLib.OPS.paintInlineImageXObject,
        pdfjsLib.OPS.paintImageMaskXObject,
      ]);

      const pages: PdfPage[] = [];
      let imageCount = 0;

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const viewport = page.getViewport({ scale: 1 });
        const textContent = await page.getTextContent();

        const positioned: PositionedText[] = [];
        for (const item of textContent.items) {
          if (!('str' in item)) continue;
          positioned.push({ x: Number(item.transform[4]), y: Number(item.transform[5]), str: item.str });
        }

        const lines = groupLines(positioned);
        const bands = splitBands(lines, viewport.height);

        const operators = await page.getOperatorList();
        imageCount += operators.fnArray.filter((fn) => imageOps.has(fn)).length;

        pages.push({
          pageNumber: pageNum,
          lines: lines.map((line) => line.text),
          headers: bands.headers,
          footers: bands.footers,
        });

        page.cleanup();
      }

      const metadata = await pdf.getMetadata();
      const title = readInfoString(metadata.info, 'Title');
      const author = readInfoString(metadata.info, 'Author');

      logger.debug('PDF read complete', {
        totalPages: pdf.numPages,
        imageCount,
      });

      return {
        pages,
        imageCount,
        ...(title !== undefined && { title }),
        ...(author !== undefined && { author }),
      };
    } finally {
      await pdf.destroy();
    }
  }
}
