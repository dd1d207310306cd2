/**
 * Format Extractor Tests
 *
 * Text cleaning, PDF line grouping, and each extractor run against an
 * in-process reader.
 */

import {
  cleanText,
  cleanCell,
  uniqueLines,
  buildTable,
  groupLines,
  splitBands,
  parseHtmlTables,
  splitSheetTables,
  stripHeaderFooterCodes,
  PdfExtractor,
  WordExtractor,
  ExcelExtractor,
  ImageExtractor,
  ExtractionFailedError,
  MEDIA_TYPES,
} from '@doctype/core';
import { FakeDocxReader, FakeOcrEngine, FakePdfReader, FakeWorkbookReader, textPdf } from './helpers';

describe('Text cleaning', () => {
  it('should collapse whitespace and drop blank lines', () => {
    expect(cleanText('  Hello\t\tWorld \r\n\r\n\u0007Line  two ')).toBe('Hello World\nLine two');
  });

  it('should normalize to NFC', () => {
    expect(cleanText('Cafe\u0301')).toBe('Caf\u00e9');
  });

  it('should put cell text on one line', () => {
    expect(cleanCell('Net\n  amount ')).toBe('Net amount');
  });

  it('should keep unique lines in first-seen order', () => {
    expect(uniqueLines(['Page 1', ' Page  1', '', 'Acme'])).toEqual(['Page 1', 'Acme']);
  });

  it('should size tables by their longest row', () => {
    expect(buildTable([['a'], ['b', 'c', ' d ']])).toEqual({
      rows: [['a'], ['b', 'c', 'd']],
      row_count: 2,
      column_count: 3,
    });
    expect(buildTable([])).toBeNull();
  });
});

describe('PDF layout', () => {
  const items = [
    { x: 300, y: 780, str: 'Header' },
    { x: 10, y: 780.4, str: 'Left' },
    { x: 10, y: 400, str: 'Body' },
    { x: 10, y: 40, str: 'Footer' },
    { x: 50, y: 40, str: '   ' },
  ];

  it('should group items into lines top to bottom', () => {
    expect(groupLines(items)).toEqual([
      { y: 780, text: 'Left Header' },
      { y: 400, text: 'Body' },
      { y: 40, text: 'Footer' },
    ]);
  });

  it('should split the header and footer bands', () => {
    expect(splitBands(groupLines(items), 800)).toEqual({
      headers: ['Left Header'],
      footers: ['Footer'],
    });
  });
});

describe('PdfExtractor', () => {
  it('should build content from every page', async () => {
    const reader = new FakePdfReader();
    const file = reader.file({
      pages: [
        { pageNumber: 1, lines: ['Acme Bank', 'Statement'], headers: ['Acme Bank'], footers: ['Page 1 of 2'] },
        { pageNumber: 2, lines: ['Acme Bank', 'Closing balance'], headers: ['Acme Bank'], footers: ['Page 2 of 2'] },
      ],
      imageCount: 2,
      title: 'Q1',
    });

    const content = await new PdfExtractor(reader).extract(file, MEDIA_TYPES.PDF);

    expect(content.raw_text).toBe('Acme Bank\nStatement\nAcme Bank\nClosing balance');
    expect(content.headers).toEqual(['Acme Bank']);
    expect(content.footers).toEqual(['Page 1 of 2', 'Page 2 of 2']);
    expect(content.page_count).toBe(2);
    expect(content.tables).toEqual([]);
    expect(content.format).toBe('PDF');
    expect(content.properties).toEqual({ image_count: 2, title: 'Q1' });
    expect(Object.isFrozen(content)).toBe(true);
    expect(Object.isFrozen(content.headers)).toBe(true);
  });

  it('should not modify the input bytes', async () => {
    const reader = new FakePdfReader();
    const file = reader.file(textPdf(['Statement']));
    const before = Buffer.from(file.bytes);

    await new PdfExtractor(reader).extract(file, MEDIA_TYPES.PDF);

    expect(file.bytes.equals(before)).toBe(true);
  });

  it('should reject empty files', async () => {
    await expect(
      new PdfExtractor(new FakePdfReader()).extract({ bytes: Buffer.alloc(0) }, MEDIA_TYPES.PDF)
    ).rejects.toMatchObject({ code: 'EXTRACTION_FAILED', reason: 'empty_file' });
  });

  it('should reject documents without text', async () => {
    const reader = new FakePdfReader();
    const file = reader.file(textPdf(['   ', '']));

    await expect(new PdfExtractor(reader).extract(file, MEDIA_TYPES.PDF)).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      reason: 'no_text',
    });
  });

  it('should report reader failures as corrupt', async () => {
    const reader = new FakePdfReader();
    const file = reader.file(new Error('Invalid PDF structure'));

    await expect(new PdfExtractor(reader).extract(file, MEDIA_TYPES.PDF)).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      reason: 'corrupt',
      message: 'Failed to extract PDF content: Invalid PDF structure',
    });
  });

  it('should pass through encrypted document errors', async () => {
    const reader = new FakePdfReader();
    const file = reader.file(new ExtractionFailedError('encrypted', 'PDF is password protected'));

    await expect(new PdfExtractor(reader).extract(file, MEDIA_TYPES.PDF)).rejects.toMatchObject({
      reason: 'encrypted',
    });
  });
});

describe('WordExtractor', () => {
  it('should parse tables out of converted HTML', () => {
    const html =
      '<p>Intro</p><table><thead><tr><th>Item</th><th>Qty</th></tr></thead>' +
      '<tr><td><p>Bolt &amp; Nut</p></td><td>4</td></tr></table>';

    expect(parseHtmlTables(html)).toEqual([
      [
        ['Item', 'Qty'],
        [' Bolt & Nut ', '4'],
      ],
    ]);
  });

  it('should extract text, tables and image count', async () => {
    const reader = new FakeDocxReader({
      text: 'Purchase Order\n\nItem   Qty',
      html:
        '<p>Purchase Order</p><table><tr><td>Item</td><td>Qty</td></tr>' +
        '<tr><td>Bolt &amp; Nut</td><td>4</td></tr></table><img src="logo.png" />',
      warnings: [],
    });

    const content = await new WordExtractor(reader).extract({ bytes: Buffer.from('docx') }, MEDIA_TYPES.DOCX);

    expect(content.raw_text).toBe('Purchase Order\nItem Qty');
    expect(content.tables).toEqual([
      {
        rows: [
          ['Item', 'Qty'],
          ['Bolt & Nut', '4'],
        ],
        row_count: 2,
        column_count: 2,
      },
    ]);
    expect(content.properties).toEqual({ image_count: 1 });
    expect(content.page_count).toBeUndefined();
  });
});

describe('ExcelExtractor', () => {
  it('should split sheet rows into tables on blank rows', () => {
    const rows = [['A', 'B'], ['1', '2'], ['', ''], ['Total', '3'], [], ['x'], ['y']];

    expect(splitSheetTables(rows)).toEqual([
      [
        ['A', 'B'],
        ['1', '2'],
      ],
      [['x'], ['y']],
    ]);
  });

  it('should strip print codes from headers and footers', () => {
    expect(stripHeaderFooterCodes('&L&"Arial,Bold"&12Acme Ltd')).toBe('Acme Ltd');
  });

  it('should extract every sheet', async () => {
    const reader = new FakeWorkbookReader([
      {
        name: 'Invoices',
        rows: [['Invoice', 'Amount'], ['INV-1', '$10.00'], [], ['Total', '$10.00']],
        mergedCellCount: 1,
        header: 'Acme Ltd',
        footer: 'Page 1',
      },
    ]);

    const content = await new ExcelExtractor(reader).extract({ bytes: Buffer.from('xlsx') }, MEDIA_TYPES.XLSX);

    expect(content.raw_text).toBe('Sheet: Invoices\nInvoice Amount\nINV-1 $10.00\nTotal $10.00');
    expect(content.tables).toHaveLength(1);
    expect(content.tables[0].rows).toEqual([
      ['Invoice', 'Amount'],
      ['INV-1', '$10.00'],
    ]);
    expect(content.headers).toEqual(['Acme Ltd', 'Invoice Amount']);
    expect(content.footers).toEqual(['Page 1']);
    expect(content.properties).toEqual({ sheet_count: 1, merged_cell_count: 1 });
  });

  it('should leave sheets without cell content out of the text', async () => {
    const reader = new FakeWorkbookReader([
      { name: 'Cover', rows: [[], ['', ' ']], mergedCellCount: 0 },
      { name: 'Data', rows: [['Total', '5']], mergedCellCount: 0 },
    ]);

    const content = await new ExcelExtractor(reader).extract({ bytes: Buffer.from('xlsx') }, MEDIA_TYPES.XLSX);

    expect(content.raw_text).toBe('Sheet: Data\nTotal 5');
    expect(content.properties).toEqual({ sheet_count: 2, merged_cell_count: 0 });
  });

  it('should fail a workbook without any cell content', async () => {
    const reader = new FakeWorkbookReader([{ name: 'Sheet1', rows: [], mergedCellCount: 0, header: 'Acme Ltd' }]);

    await expect(
      new ExcelExtractor(reader).extract({ bytes: Buffer.from('xlsx') }, MEDIA_TYPES.XLSX)
    ).rejects.toMatchObject({ code: 'EXTRACTION_FAILED', reason: 'no_text' });
  });
});

describe('ImageExtractor', () => {
  it('should return OCR text as a single page', async () => {
    const ocr = new FakeOcrEngine();
    const file = ocr.file('PASSPORT\nSurname  ROE');

    const content = await new ImageExtractor({ engine: ocr }).extract(file, MEDIA_TYPES.JPEG);

    expect(content.raw_text).toBe('PASSPORT\nSurname ROE');
    expect(content.format).toBe('IMAGE');
    expect(content.page_count).toBe(1);
    expect(content.properties).toEqual({ ocr_applied: true });
  });

  it('should reject OCR output that is mostly noise', async () => {
    const ocr = new FakeOcrEngine();
    const extractor = new ImageExtractor({ engine: ocr });

    await expect(extractor.extract(ocr.file(''), MEDIA_TYPES.JPEG)).rejects.toMatchObject({
      reason: 'ocr_no_text',
    });
    await expect(extractor.extract(ocr.file('~ ~ . | a'), MEDIA_TYPES.JPEG)).rejects.toMatchObject({
      reason: 'ocr_no_text',
    });
    await expect(extractor.extract(ocr.file(`abc ${'~'.repeat(40)}`), MEDIA_TYPES.JPEG)).rejects.toMatchObject({
      reason: 'ocr_no_text',
    });
  });
});
