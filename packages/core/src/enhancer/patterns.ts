/**
 * Content Patterns
 *
 * Regex-based detectors for dates, currency amounts, header/footer
 * conventions and table shapes.
 */

import type { Table, TableKind } from '../types';

/** Cap on dates and amounts reported in result metadata */
export const MAX_REPORTED_VALUES = 20;

const MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December|' +
  'Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec';

const ISO_DATE = String.raw`\b\d{4}-\d{2}-\d{2}\b`;
const NUMERIC_DATE = String.raw`\b\d{1,2}/\d{1,2}/\d{4}\b`;
const MONTH_NAME_DATE = String.raw`\b(?:${MONTHS})\.?\s+\d{1,2},\s*\d{4}\b`;

const DATE_PATTERN = new RegExp(`${ISO_DATE}|${NUMERIC_DATE}|${MONTH_NAME_DATE}`, 'gi');
const AMOUNT_PATTERN = /(?:[$€£]\s?|\bUSD\s?)(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?/g;

function firstUnique<T>(values: T[]): T[] {
  return Array.from(new Set(values)).slice(0, MAX_REPORTED_VALUES);
}

/**
 * Dates in order of appearance: ISO, M/D/YYYY and `Month D, YYYY` forms.
 */
export function findDates(text: string): string[] {
  return firstUnique(Array.from(text.matchAll(DATE_PATTERN), (match) => match[0].replace(/\s+/g, ' ')));
}

/**
 * Currency amounts prefixed by $, €, £ or USD, parsed to numbers.
 */
export function findAmounts(text: string): number[] {
  return firstUnique(
    Array.from(text.matchAll(AMOUNT_PATTERN), (match) => {
      const whole = match[1].replace(/,/g, '');
      return Number(match[2] !== undefined ? `${whole}.${match[2]}` : whole);
    })
  );
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export interface HeaderPatterns {
  page_number: boolean;
  date: boolean;
  letterhead: boolean;
  logo_reference: boolean;
}

export interface FooterPatterns {
  page_number: boolean;
  copyright: boolean;
  contact_info: boolean;
  disclaimer: boolean;
}

const PAGE_NUMBER = /\bpage\s*\d+|\b\d+\s+of\s+\d+\b/i;

export function analyzeHeaders(headers: readonly string[]): HeaderPatterns {
  const text = headers.join(' ');
  return {
    page_number: PAGE_NUMBER.test(text),
    date: /\b(?:date|dated):|\bas of\b/i.test(text) || new RegExp(DATE_PATTERN.source, 'i').test(text),
    letterhead: /\b(?:confidential|draft|final)\b/i.test(text),
    logo_reference: /\b(?:logo|brand|trademark)\b|™|®/i.test(text),
  };
}

export function analyzeFooters(footers: readonly string[]): FooterPatterns {
  const text = footers.join(' ');
  return {
    page_number: PAGE_NUMBER.test(text),
    copyright: /\bcopyright\b|©|\ball rights reserved\b/i.test(text),
    contact_info: /\b(?:tel|phone|fax|email):|www\.|https?:\/\/|[\w.+-]+@[\w-]+\.[\w.]+/i.test(text),
    disclaimer: /\b(?:confidential|disclaimer|privacy)\b/i.test(text),
  };
}

// ============================================================================
// Tables
// ============================================================================

const TABLE_HEADER_KEYWORDS = ['total', 'sum', 'amount', 'date', 'description', 'qty', 'price', 'name'];
const FINANCIAL_TABLE_KEYWORDS = ['amount', 'total', 'balance', 'price'];

export function isNumericCell(cell: string): boolean {
  return /^[-+(]?[$€£]?\s?\d[\d,]*(?:\.\d+)?%?\)?$/.test(cell.trim());
}

/**
 * First row is a header when it has content, no purely numeric cells, and
 * either names a typical column or is all text above numeric data.
 */
export function hasHeaderRow(table: Table): boolean {
  const [first, ...rest] = table.rows;
  if (!first || !first.some((cell) => cell.trim() !== '')) return false;
  if (first.some(isNumericCell)) return false;

  const lowered = first.map((cell) => cell.toLowerCase());
  if (lowered.some((cell) => TABLE_HEADER_KEYWORDS.some((keyword) => cell.includes(keyword)))) {
    return true;
  }

  const allText = first.every((cell) => cell.trim() !== '');
  return allText && rest.some((row) => row.some(isNumericCell));
}

export function classifyTable(table: Table): TableKind {
  const mentionsMoney = table.rows.some((row) =>
    row.some((cell) => {
      const lowered = cell.toLowerCase();
      return FINANCIAL_TABLE_KEYWORDS.some((keyword) => lowered.includes(keyword));
    })
  );
  if (mentionsMoney) return 'financial';
  if (table.column_count === 1) return 'list';
  if (table.column_count === 2 && table.rows.every((row) => !/^\d+$/.test((row[0] ?? '').trim()))) {
    return 'form';
  }
  return 'generic';
}
