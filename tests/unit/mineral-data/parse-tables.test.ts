import { describe, it, expect } from 'vitest';

import {
  buildSourceTable,
  decodeCsv,
  parseNumericCell,
  parseTextCell,
  resolveSourceName,
} from '@/modules/mineral-data/index.js';

describe('source table parsing', () => {
  describe('parseNumericCell', () => {
    it('parses trimmed numbers', () => {
      expect(parseNumericCell('42')).toBe(42);
      expect(parseNumericCell(' 3.5 ')).toBe(3.5);
      expect(parseNumericCell('-10.25')).toBe(-10.25);
    });

    it('reads blank and non-numeric cells as null, never zero', () => {
      expect(parseNumericCell(undefined)).toBeNull();
      expect(parseNumericCell('')).toBeNull();
      expect(parseNumericCell('   ')).toBeNull();
      expect(parseNumericCell('n/a')).toBeNull();
      expect(parseNumericCell('Infinity')).toBeNull();
    });

    it('accepts decimal notation only', () => {
      expect(parseNumericCell('1e3')).toBe(1000);
      expect(parseNumericCell('.5')).toBe(0.5);
      expect(parseNumericCell('7.')).toBe(7);
      expect(parseNumericCell('+2')).toBe(2);
      expect(parseNumericCell('0x10')).toBeNull();
      expect(parseNumericCell('0b11')).toBeNull();
      expect(parseNumericCell('0o7')).toBeNull();
      expect(parseNumericCell('1_000')).toBeNull();
    });
  });

  describe('parseTextCell', () => {
    it('trims and maps blanks to null', () => {
      expect(parseTextCell('  Zed ')).toBe('Zed');
      expect(parseTextCell('')).toBeNull();
      expect(parseTextCell(undefined)).toBeNull();
    });
  });

  describe('resolveSourceName', () => {
    it('accepts only the canonical file names', () => {
      expect(resolveSourceName('countries.csv')).toBe('countries');
      expect(resolveSourceName('production_stats.csv')).toBe('production');
      expect(resolveSourceName('production.csv')).toBeNull();
      expect(resolveSourceName('Countries.csv')).toBeNull();
      expect(resolveSourceName('evil.csv')).toBeNull();
    });
  });

  describe('decodeCsv', () => {
    it('strips a byte order mark and trims header names', () => {
      const table = decodeCsv('\uFEFF CountryID , CountryName\n1,Zed')._unsafeUnwrap();

      expect(table.columns).toEqual(['CountryID', 'CountryName']);
      expect(table.records).toEqual([{ CountryID: '1', CountryName: 'Zed' }]);
    });

    it('tolerates short rows and skips empty lines', () => {
      const table = decodeCsv('a,b\n\n1\n2,3\n')._unsafeUnwrap();

      expect(table.records).toEqual([{ a: '1' }, { a: '2', b: '3' }]);
    });

    it('keeps the first of repeated column names', () => {
      const table = decodeCsv('a,a\n1,2')._unsafeUnwrap();

      expect(table.columns).toEqual(['a', 'a']);
      expect(table.records).toEqual([{ a: '1' }]);
    });

    it('decodes an empty file to no columns', () => {
      expect(decodeCsv('')._unsafeUnwrap()).toEqual({ columns: [], records: [] });
    });

    it('reports an unterminated quote', () => {
      expect(decodeCsv('a,b\n"1,2')._unsafeUnwrapErr()).toContain('Quote Not Closed');
    });
  });

  describe('buildSourceTable', () => {
    it('types the rows of a loaded table', () => {
      const raw = decodeCsv(
        'CountryID,CountryName,GDP_BillionUSD,MiningRevenue_BillionUSD,KeyProjects\n1,Zed,,2.5,'
      )._unsafeUnwrap();

      const table = buildSourceTable('countries', raw);

      expect(table.status).toEqual({ kind: 'loaded' });
      expect(table.file).toBe('countries.csv');
      expect(table.rows).toEqual([
        {
          id: 1,
          name: 'Zed',
          gdpBillionUsd: null,
          miningRevenueBillionUsd: 2.5,
          keyProjects: null,
        },
      ]);
    });

    it('keeps the actual header and reads absent columns as null', () => {
      const raw = decodeCsv('MineralID,Colour\n7,blue')._unsafeUnwrap();

      const table = buildSourceTable('minerals', raw);

      expect(table.columns).toEqual(['MineralID', 'Colour']);
      expect(table.rows).toEqual([{ id: 7, name: null, description: null }]);
    });

    it('marks a file without a header as malformed', () => {
      const table = buildSourceTable('sites', { columns: [], records: [] });

      expect(table.status).toEqual({ kind: 'malformed', reason: 'File has no header row' });
      expect(table.rows).toEqual([]);
      expect(table.columns).toContain('Latitude');
    });
  });
});
