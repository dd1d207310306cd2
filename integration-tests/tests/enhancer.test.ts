/**
 * Result Enhancer Tests
 */

import {
  ResultEnhancer,
  findDates,
  findAmounts,
  countWords,
  analyzeHeaders,
  analyzeFooters,
  hasHeaderRow,
  classifyTable,
  isNumericCell,
  formatFeatures,
  buildTable,
  MAX_REPORTED_VALUES,
} from '@doctype/core';
import type { Classification, ExtractedContent, Table } from '@doctype/core';

function table(rows: string[][]): Table {
  const built = buildTable(rows);
  if (!built) throw new Error('empty table');
  return built;
}

const classification: Classification = {
  document_type: 'invoice',
  industry: 'financial',
  confidence: 3 / 7,
  matched_keywords: { invoice: 3 },
  method: 'keyword_matching',
};

describe('Value detection', () => {
  it('should find dates in order of appearance', () => {
    const text = 'Issued 2024-01-15, due 02/14/2024 or Feb 28, 2024; again 2024-01-15';

    expect(findDates(text)).toEqual(['2024-01-15', '02/14/2024', 'Feb 28, 2024']);
  });

  it('should find currency amounts', () => {
    const text = 'Paid $1,234.56 and USD 99 and €5 and $1,234.56 and 300 units';

    expect(findAmounts(text)).toEqual([1234.56, 99, 5]);
  });

  it('should cap reported values', () => {
    const text = Array.from({ length: 30 }, (_, i) => `$${i + 1}`).join(' ');

    expect(findAmounts(text)).toHaveLength(MAX_REPORTED_VALUES);
    expect(findAmounts(text)[19]).toBe(20);
  });

  it('should count words', () => {
    expect(countWords('  one two\nthree ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('Header and footer patterns', () => {
  it('should detect header conventions', () => {
    expect(analyzeHeaders(['Page 1 of 3', 'CONFIDENTIAL'])).toEqual({
      page_number: true,
      date: false,
      letterhead: true,
      logo_reference: false,
    });
    expect(analyzeHeaders(['Statement date: 2024-03-31'])).toMatchObject({ date: true, page_number: false });
  });

  it('should detect footer conventions', () => {
    expect(analyzeFooters(['© 2025 Test Co. All rights reserved', 'Email: help@example.com'])).toEqual({
      page_number: false,
      copyright: true,
      contact_info: true,
      disclaimer: false,
    });
    expect(analyzeFooters([])).toEqual({
      page_number: false,
      copyright: false,
      contact_info: false,
      disclaimer: false,
    });
  });
});

describe('Table analysis', () => {
  it('should recognise numeric cells', () => {
    expect(isNumericCell('$1,200.50')).toBe(true);
    expect(isNumericCell('(45)')).toBe(true);
    expect(isNumericCell('12%')).toBe(true);
    expect(isNumericCell('A-100')).toBe(false);
  });

  it('should classify table shapes', () => {
    const lineItems = table([['Description', 'Qty', 'Amount'], ['Widget', '2', '$10.00']]);
    const names = table([['Name'], ['Alice'], ['Bob']]);
    const form = table([['Policy', 'A-100'], ['Holder', 'Jane Roe']]);
    const grid = table([['1', '2', '3'], ['4', '5', '6']]);

    expect([lineItems, names, form, grid].map(classifyTable)).toEqual(['financial', 'list', 'form', 'generic']);
    expect([lineItems, names, form, grid].map(hasHeaderRow)).toEqual([true, true, false, false]);
  });

  it('should take an all-text first row above numbers as a header', () => {
    expect(hasHeaderRow(table([['Region', 'Units'], ['North', '120']]))).toBe(true);
  });
});

describe('ResultEnhancer', () => {
  const invoice: ExtractedContent = {
    raw_text: 'Invoice INV-001\nAmount due by March 3, 2025\nTotal $450.00',
    tables: [table([['Description', 'Amount'], ['Consulting', '$450.00']])],
    headers: ['Page 1 of 1'],
    footers: ['www.example.com'],
    format: 'WORD',
    media_type: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    properties: { image_count: 0 },
  };

  it('should build the result around the classification', () => {
    const result = new ResultEnhancer().enhance(invoice, classification, {
      fileSize: 1024,
      sha256: 'abc123',
      filename: 'invoice.docx',
    });

    expect(result.document_type).toBe('invoice');
    expect(result.industry).toBe('financial');
    expect(result.confidence).toBe(3 / 7);
    expect(result.matched_keywords).toEqual({ invoice: 3 });
    expect(result.enhancement).toEqual({
      tables_detected: 1,
      table_summaries: [{ index: 0, rows: 2, columns: 2, has_header_row: true, kind: 'financial' }],
      format_features: {
        has_tables: true,
        has_headers: true,
        has_footers: true,
        has_embedded_images: false,
        image_count: 0,
      },
    });
    expect(result.metadata).toEqual({
      media_type: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      classification_method: 'keyword_matching',
      content_length: 57,
      word_count: 10,
      dates: ['March 3, 2025'],
      amounts: [450],
      header_patterns: { page_number: true, date: false, letterhead: false, logo_reference: false },
      footer_patterns: { page_number: false, copyright: false, contact_info: true, disclaimer: false },
      document_properties: { image_count: 0 },
      file_size: 1024,
      file_sha256: 'abc123',
      filename: 'invoice.docx',
    });
  });

  it('should include the text only when asked', () => {
    const enhancer = new ResultEnhancer();

    expect(enhancer.enhance(invoice, classification).metadata.extracted_text).toBeUndefined();
    expect(enhancer.enhance(invoice, classification, { includeText: true }).metadata.extracted_text).toBe(
      invoice.raw_text
    );
  });

  it('should describe spreadsheet and image features', () => {
    const base = { ...invoice, tables: [], headers: [], footers: [] };

    expect(formatFeatures({ ...base, format: 'EXCEL', properties: { sheet_count: 2, merged_cell_count: 3 } })).toEqual({
      has_tables: false,
      has_headers: false,
      has_footers: false,
      has_merged_cells: true,
      merged_cell_count: 3,
      sheet_count: 2,
    });
    expect(formatFeatures({ ...base, format: 'IMAGE', properties: { ocr_applied: true } })).toEqual({
      has_tables: false,
      has_headers: false,
      has_footers: false,
      ocr_applied: true,
    });
  });
});
