/**
 * Text normalization helpers shared by the extractors.
 */

import type { Table } from '../types';

// C0 controls except \t \n \r, plus DEL
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/**
 * Normalize extracted text: NFC, control characters removed, whitespace runs
 * collapsed within each line, blank lines dropped.
 */
export function cleanText(text: string): string {
  return text
    .normalize('NFC')
    .replace(CONTROL_CHARS, '')
    .split(/\r\n|\r|\n/)
    .map((line) => line.replace(/[ \t ]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Normalize a single table cell or header line onto one line.
 */
export function cleanCell(value: string): string {
  return cleanText(value).replace(/\n/g, ' ');
}

/**
 * Unique, non-empty cleaned strings in first-seen order.
 */
export function uniqueLines(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const cleaned = cleanCell(value);
    if (cleaned) seen.add(cleaned);
  }
  return Array.from(seen);
}

/**
 * Build a Table from raw rows. Returns null when there are no rows.
 */
export function buildTable(rows: readonly (readonly string[])[]): Table | null {
  if (rows.length === 0) return null;

  const cleanedRows = rows.map((row) => row.map(cleanCell));
  const columnCount = cleanedRows.reduce((max, row) => Math.max(max, row.length), 0);

  return {
    rows: cleanedRows,
    row_count: cleanedRows.length,
    column_count: columnCount,
  };
}

/**
 * Count letters and digits in a string.
 */
export function countAlphanumeric(text: string): number {
  const matches = text.match(/[\p{L}\p{N}]/gu);
  return matches ? matches.length : 0;
}

/**
 * Recursively freeze a plain data structure.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
