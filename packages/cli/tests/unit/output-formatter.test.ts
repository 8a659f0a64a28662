/**
 * Unit tests for Output Formatter
 */

import { describe, it, expect } from 'vitest';
import { formatJSON, formatTable, formatCSV, formatOutput } from '../../src/core/output-formatter.js';
import type { OutputRow } from '../../src/types/index.js';

describe('OutputFormatter', () => {
  describe('formatJSON', () => {
    it('pretty-prints with two-space indentation', () => {
      expect(formatJSON({ year: 2000, mean: 2 })).toBe('{\n  "year": 2000,\n  "mean": 2\n}');
    });
  });

  describe('formatTable', () => {
    it('pads every column to its widest value', () => {
      const rows: OutputRow[] = [
        { name: 'hist', year: 2000 },
        { name: 'rcp85', year: 2002 },
      ];
      expect(formatTable(rows).split('\n')).toEqual([
        'name  | year',
        '------|-----',
        'hist  | 2000',
        'rcp85 | 2002',
      ]);
    });

    it('prints null as an empty cell', () => {
      expect(formatTable([{ year: 2000, trend: null }]).split('\n')[2]).toBe('2000 |      ');
    });

    it('uses the given columns in order', () => {
      expect(formatTable([{ a: 1, b: 2 }], ['b', 'a']).split('\n')[0]).toBe('b | a');
    });

    it('handles empty rows', () => {
      expect(formatTable([])).toBe('No data to display');
    });
  });

  describe('formatCSV', () => {
    it('writes a header and one line per row', () => {
      const rows: OutputRow[] = [
        { lat: 0, lon: 10, value: 10 },
        { lat: 0, lon: 20, value: null },
      ];
      expect(formatCSV(rows)).toBe('lat,lon,value\n0,10,10\n0,20,');
    });

    it('quotes values with commas and doubles embedded quotes', () => {
      expect(formatCSV([{ label: 'a,b', note: 'say "hi"' }])).toBe('label,note\n"a,b","say ""hi"""');
    });

    it('handles empty rows', () => {
      expect(formatCSV([])).toBe('');
    });
  });

  describe('formatOutput', () => {
    const result = { annual: [{ year: 2000, mean: 2 }] };
    const toRows = (value: typeof result): OutputRow[] => value.annual;

    it('prints the whole result as JSON', () => {
      expect(JSON.parse(formatOutput(result, 'json', toRows))).toEqual(result);
    });

    it('prints the derived rows as CSV', () => {
      expect(formatOutput(result, 'csv', toRows)).toBe('year,mean\n2000,2');
    });

    it('prints the derived rows as a table', () => {
      expect(formatOutput(result, 'table', toRows)).toBe('year | mean\n-----|-----\n2000 | 2   ');
    });
  });
});
