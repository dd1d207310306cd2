/**
 * XLSX Reading
 *
 * Loads workbooks with exceljs and flattens each worksheet into a grid of
 * display strings.
 */

import ExcelJS from 'exceljs';

export interface SheetData {
  name: string;
  /** Cell display text, row-major; blank rows are kept as empty arrays */
  rows: string[][];
  /** Cells covered by a merge other than its top-left master */
  mergedCellCount: number;
  header?: string;
  footer?: string;
}

export interface WorkbookReader {
  read(buffer: Buffer): Promise<SheetData[]>;
}

/**
 * Strip the formatting codes (`&L`, `&"Arial,Bold"`, `&12`) from a print
 * header or footer.
 */
export function stripHeaderFooterCodes(value: string): string {
  return value
    .replace(/&"[^"]*"/g, '')
    .replace(/&\d+/g, '')
    .replace(/&[A-Za-z&]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class ExcelJsReader implements WorkbookReader {
  async read(buffer: Buffer): Promise<SheetData[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer);

    return workbook.worksheets.map((worksheet) => {
      const rows: string[][] = [];
      let mergedCellCount = 0;

      for (let r = 1; r <= worksheet.rowCount; r++) {
        const row = worksheet.getRow(r);
        const cells: string[] = [];
        for (let c = 1; c <= worksheet.columnCount; c++) {
          const cell = row.getCell(c);
          if (cell.isMerged && cell.master.address !== cell.address) {
            mergedCellCount++;
            cells.push('');
            continue;
          }
          cells.push(cell.text);
        }
        // Trailing empty cells carry no information
        while (cells.length > 0 && cells[cells.length - 1].trim() === '') {
          cells.pop();
        }
        rows.push(cells);
      }

      const header = stripHeaderFooterCodes(worksheet.headerFooter?.oddHeader ?? '');
      const footer = stripHeaderFooterCodes(worksheet.headerFooter?.oddFooter ?? '');

      return {
        name: worksheet.name,
        rows,
        mergedCellCount,
        ...(header && { header }),
        ...(footer && { footer }),
      };
    });
  }
}
