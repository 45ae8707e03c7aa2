/**
 * Table cell normalisation and row-to-record mapping.
 */

import type { CellValue, ExtractedTable, RawTable } from '../types/index.js';
import { normalizeSpace, parseNumber } from './text.js';

const NUMERIC_CELL = /^[\d.\-+%$€£¥₹ ]+$/;

/**
 * Numeric-looking cells ("$1,200", "12%", "-3.5") become numbers; anything
 * else is returned as whitespace-normalised text.
 */
export function normalizeCellValue(value: string | null | undefined): CellValue {
  if (value === null || value === undefined) return null;
  const text = normalizeSpace(value);
  if (!text) return '';

  const numeric = parseNumber(text);
  if (numeric !== null && NUMERIC_CELL.test(text.replace(/,/g, ''))) {
    return numeric;
  }
  return text;
}

/**
 * Record keys are the lowercased headers with spaces replaced by `_`.
 * Missing cells map to null.
 */
export function rowsToRecords(
  headers: string[],
  rows: CellValue[][]
): Array<Record<string, CellValue>> {
  if (headers.length === 0) return [];

  const keys = headers.map((header, idx) =>
    (header.trim() || `column_${idx + 1}`).toLowerCase().replace(/ /g, '_')
  );

  return rows.map((row) => {
    const record: Record<string, CellValue> = {};
    keys.forEach((key, idx) => {
      record[key] = idx < row.length ? row[idx] : null;
    });
    return record;
  });
}

export function buildTable(raw: RawTable, index: number): ExtractedTable {
  const rows = raw.rows.map((row) => row.map((cell) => normalizeCellValue(cell)));
  return {
    index,
    headers: raw.headers,
    rows,
    records: rowsToRecords(raw.headers, rows),
    rowCount: rows.length,
    columnCount: raw.headers.length,
  };
}
