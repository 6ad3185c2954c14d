/**
 * Source table parsing.
 *
 * Turns decoded CSV records into typed rows. A header without one of the
 * expected columns still loads; the absent cells read as null.
 */

import { SOURCE_COLUMNS, SOURCE_FILES } from './types.js';

import type {
  Country,
  Mineral,
  ProductionRecord,
  Site,
  SourceName,
  SourceRows,
  SourceTable,
  TableStatus,
} from './types.js';

/**
 * Header and records as decoded from a CSV file. Each record is keyed by
 * header name.
 */
export interface RawTable {
  readonly columns: readonly string[];
  readonly records: readonly Readonly<Record<string, string>>[];
}

type Cells = Readonly<Record<string, string>>;

// ─────────────────────────────────────────────────────────────────────────────
// Cells
// ─────────────────────────────────────────────────────────────────────────────

/** Plain decimal notation; hex, binary and octal literals are not numbers here */
const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses a numeric cell. Blank and non-numeric cells are null, never zero.
 */
export const parseNumericCell = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null;
  }

  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  if (!DECIMAL_NUMBER.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

export const parseTextCell = (raw: string | undefined): string | null => {
  if (raw === undefined) {
    return null;
  }

  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
};

// ─────────────────────────────────────────────────────────────────────────────
// Rows
// ─────────────────────────────────────────────────────────────────────────────

const parseCountry = (cells: Cells): Country => ({
  id: parseNumericCell(cells['CountryID']),
  name: parseTextCell(cells['CountryName']),
  gdpBillionUsd: parseNumericCell(cells['GDP_BillionUSD']),
  miningRevenueBillionUsd: parseNumericCell(cells['MiningRevenue_BillionUSD']),
  keyProjects: parseTextCell(cells['KeyProjects']),
});

const parseMineral = (cells: Cells): Mineral => ({
  id: parseNumericCell(cells['MineralID']),
  name: parseTextCell(cells['MineralName']),
  description: parseTextCell(cells['Description']),
});

const parseProductionRecord = (cells: Cells): ProductionRecord => ({
  countryId: parseNumericCell(cells['CountryID']),
  mineralId: parseNumericCell(cells['MineralID']),
  productionTonnes: parseNumericCell(cells['Production_tonnes']),
  exportValueBillionUsd: parseNumericCell(cells['ExportValue_BillionUSD']),
});

const parseSite = (cells: Cells): Site => ({
  id: parseNumericCell(cells['SiteID']),
  name: parseTextCell(cells['SiteName']),
  countryId: parseNumericCell(cells['CountryID']),
  mineralId: parseNumericCell(cells['MineralID']),
  latitude: parseNumericCell(cells['Latitude']),
  longitude: parseNumericCell(cells['Longitude']),
  productionTonnes: parseNumericCell(cells['Production_tonnes']),
});

const ROW_PARSERS: { [S in SourceName]: (cells: Cells) => SourceRows[S] } = {
  countries: parseCountry,
  minerals: parseMineral,
  production: parseProductionRecord,
  sites: parseSite,
};

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An empty table with the expected header, for sources that did not load.
 */
export const emptySourceTable = <S extends SourceName>(
  source: S,
  status: Exclude<TableStatus, { kind: 'loaded' }>
): SourceTable<S> => ({
  source,
  file: SOURCE_FILES[source],
  columns: SOURCE_COLUMNS[source],
  rows: [],
  status,
});

/**
 * Builds a typed table from decoded CSV. A file without a header row is
 * malformed.
 */
export const buildSourceTable = <S extends SourceName>(source: S, raw: RawTable): SourceTable<S> => {
  if (raw.columns.length === 0) {
    return emptySourceTable(source, { kind: 'malformed', reason: 'File has no header row' });
  }

  const parseRow = ROW_PARSERS[source];
  return {
    source,
    file: SOURCE_FILES[source],
    columns: raw.columns,
    rows: raw.records.map(parseRow),
    status: { kind: 'loaded' },
  };
};
