/**
 * Excel Extractor
 *
 * Each sheet with cell content contributes a `Sheet: <name>` line followed
 * by its non-empty rows. Blank rows separate tables. A workbook without any
 * cell content has no text and fails as `no_text`.
 */

import type { DocumentFormat } from '../types';
import type { ExtractionDraft } from './types';
import { BaseExtractor } from './base-extractor';
import { MEDIA_TYPES } from './media-type';
import { ExcelJsReader, type SheetData, type WorkbookReader } from '../lib/xlsx';

/** A run of rows shorter than this is not reported as a table */
export const MIN_TABLE_ROWS = 2;

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim() === '');
}

/**
 * Split a sheet's rows into tables on blank rows.
 */
export function splitSheetTables(rows: readonly string[][]): string[][][] {
  const tables: string[][][] = [];
  let current: string[][] = [];

  const flush = () => {
    if (current.length >= MIN_TABLE_ROWS) tables.push(current);
    current = [];
  };

  for (const row of rows) {
    if (isBlankRow(row)) {
      flush();
    } else {
      current.push(row);
    }
  }
  flush();

  return tables;
}

function sheetText(sheet: SheetData): string {
  const lines: string[] = [];
  for (const row of sheet.rows) {
    const values = row.map((cell) => cell.trim()).filter((cell) => cell.length > 0);
    if (values.length > 0) lines.push(values.join(' '));
  }
  // The label alone is not document text
  if (lines.length === 0) return '';
  return [`Sheet: ${sheet.name}`, ...lines].join('\n');
}

export class ExcelExtractor extends BaseExtractor {
  readonly name = 'excel';
  readonly format: DocumentFormat = 'EXCEL';
  readonly supportedMediaTypes = [MEDIA_TYPES.XLSX];

  constructor(private readonly reader: WorkbookReader = new ExcelJsReader()) {
    super();
  }

  protected async read(bytes: Buffer): Promise<ExtractionDraft> {
    const sheets = await this.reader.read(bytes);

    const headers: string[] = [];
    const footers: string[] = [];

    for (const sheet of sheets) {
      if (sheet.header) headers.push(sheet.header);
      const firstRow = sheet.rows.find((row) => !isBlankRow(row));
      if (firstRow) {
        headers.push(firstRow.filter((cell) => cell.trim() !== '').join(' '));
      }
      if (sheet.footer) footers.push(sheet.footer);
    }

    return {
      text: sheets.map(sheetText).filter((text) => text.length > 0).join('\n'),
      tables: sheets.flatMap((sheet) => splitSheetTables(sheet.rows)),
      headers,
      footers,
      properties: {
        sheet_count: sheets.length,
        merged_cell_count: sheets.reduce((sum, sheet) => sum + sheet.mergedCellCount, 0),
      },
    };
  }
}
