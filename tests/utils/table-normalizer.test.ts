import { describe, it, expect } from 'vitest';
import { buildTable, normalizeCellValue, rowsToRecords } from '../../src/utils/table-normalizer.js';

describe('table normalizer', () => {
  describe('normalizeCellValue', () => {
    it('should turn numeric-looking cells into numbers', () => {
      expect(normalizeCellValue('$1,200')).toBe(1200);
      expect(normalizeCellValue('12%')).toBe(12);
      expect(normalizeCellValue(' -3.5 ')).toBe(-3.5);
    });

    it('should keep text cells as normalised text', () => {
      expect(normalizeCellValue('Model  3')).toBe('Model 3');
      expect(normalizeCellValue('N/A')).toBe('N/A');
    });

    it('should keep empty and missing cells distinct', () => {
      expect(normalizeCellValue('   ')).toBe('');
      expect(normalizeCellValue(null)).toBeNull();
    });
  });

  describe('rowsToRecords', () => {
    it('should key records by snake-cased headers and fill missing cells with null', () => {
      expect(rowsToRecords(['Name', 'Unit Price'], [['Widget', 4], ['Gadget']])).toEqual([
        { name: 'Widget', unit_price: 4 },
        { name: 'Gadget', unit_price: null },
      ]);
    });

    it('should name blank headers by position', () => {
      expect(rowsToRecords(['Name', ' '], [['a', 'b']])).toEqual([{ name: 'a', column_2: 'b' }]);
    });

    it('should return nothing without headers', () => {
      expect(rowsToRecords([], [['a']])).toEqual([]);
    });
  });

  it('should build a table with counts', () => {
    const table = buildTable({ headers: ['Plan', 'Cost'], rows: [['Basic', '$5'], ['Pro', '$12']] }, 0);
    expect(table).toEqual({
      index: 0,
      headers: ['Plan', 'Cost'],
      rows: [
        ['Basic', 5],
        ['Pro', 12],
      ],
      records: [
        { plan: 'Basic', cost: 5 },
        { plan: 'Pro', cost: 12 },
      ],
      rowCount: 2,
      columnCount: 2,
    });
  });
});
