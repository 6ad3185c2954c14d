/**
 * Join step: production records and sites enriched with their country and
 * mineral. Inner join semantics, in the order of the left table; duplicate
 * ids on the right produce one row per match.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInsufficientDataReason,
  createMissingJoinColumnError,
  type MissingJoinColumnError,
} from './errors.js';

import type {
  Country,
  CountryColumns,
  JoinedProduction,
  JoinedSite,
  JoinedView,
  Mineral,
  MineralColumns,
  ProductionView,
  SiteView,
  SourceName,
  SourceTables,
} from './types.js';

interface TableHeader {
  readonly source: SourceName;
  readonly columns: readonly string[];
  readonly rows: readonly unknown[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const requireColumns = (
  required: readonly (readonly [TableHeader, string])[]
): Result<void, MissingJoinColumnError> => {
  for (const [table, column] of required) {
    if (!table.columns.includes(column)) {
      return err(createMissingJoinColumnError(table.source, column));
    }
  }
  return ok(undefined);
};

const pushTo = <K, V>(index: Map<K, V[]>, key: K, value: V): void => {
  const bucket = index.get(key);
  if (bucket === undefined) {
    index.set(key, [value]);
  } else {
    bucket.push(value);
  }
};

const indexCountries = (countries: readonly Country[]): Map<number, CountryColumns[]> => {
  const index = new Map<number, CountryColumns[]>();
  for (const country of countries) {
    if (country.id === null || country.name === null) {
      continue;
    }
    pushTo(index, country.id, {
      countryId: country.id,
      countryName: country.name,
      gdpBillionUsd: country.gdpBillionUsd,
      miningRevenueBillionUsd: country.miningRevenueBillionUsd,
      keyProjects: country.keyProjects,
    });
  }
  return index;
};

const indexMinerals = (minerals: readonly Mineral[]): Map<number, MineralColumns[]> => {
  const index = new Map<number, MineralColumns[]>();
  for (const mineral of minerals) {
    if (mineral.id === null || mineral.name === null) {
      continue;
    }
    pushTo(index, mineral.id, {
      mineralId: mineral.id,
      mineralName: mineral.name,
      description: mineral.description,
    });
  }
  return index;
};

/**
 * Calls `emit` once per (country, mineral) pair matching the keys.
 */
const forEachMatch = (
  countries: Map<number, CountryColumns[]>,
  minerals: Map<number, MineralColumns[]>,
  countryId: number | null,
  mineralId: number | null,
  emit: (country: CountryColumns, mineral: MineralColumns) => void
): void => {
  if (countryId === null || mineralId === null) {
    return;
  }
  for (const country of countries.get(countryId) ?? []) {
    for (const mineral of minerals.get(mineralId) ?? []) {
      emit(country, mineral);
    }
  }
};

const emptySources = (tables: readonly TableHeader[]): SourceName[] =>
  tables.filter((table) => table.rows.length === 0).map((table) => table.source);

// ─────────────────────────────────────────────────────────────────────────────
// Joins
// ─────────────────────────────────────────────────────────────────────────────

export const joinProduction = (
  tables: Pick<SourceTables, 'countries' | 'minerals' | 'production'>
): Result<JoinedProduction[], MissingJoinColumnError> => {
  const { countries, minerals, production } = tables;

  return requireColumns([
    [production, 'CountryID'],
    [countries, 'CountryID'],
    [production, 'MineralID'],
    [minerals, 'MineralID'],
  ]).map(() => {
    const countryIndex = indexCountries(countries.rows);
    const mineralIndex = indexMinerals(minerals.rows);
    const rows: JoinedProduction[] = [];

    for (const record of production.rows) {
      forEachMatch(countryIndex, mineralIndex, record.countryId, record.mineralId, (c, m) => {
        rows.push({
          ...c,
          ...m,
          productionTonnes: record.productionTonnes,
          exportValueBillionUsd: record.exportValueBillionUsd,
        });
      });
    }
    return rows;
  });
};

export const joinSites = (
  tables: Pick<SourceTables, 'countries' | 'minerals' | 'sites'>
): Result<JoinedSite[], MissingJoinColumnError> => {
  const { countries, minerals, sites } = tables;

  return requireColumns([
    [sites, 'CountryID'],
    [countries, 'CountryID'],
    [sites, 'MineralID'],
    [minerals, 'MineralID'],
  ]).map(() => {
    const countryIndex = indexCountries(countries.rows);
    const mineralIndex = indexMinerals(minerals.rows);
    const rows: JoinedSite[] = [];

    for (const site of sites.rows) {
      forEachMatch(countryIndex, mineralIndex, site.countryId, site.mineralId, (c, m) => {
        rows.push({
          ...c,
          ...m,
          siteId: site.id,
          siteName: site.name,
          latitude: site.latitude,
          longitude: site.longitude,
          productionTonnes: site.productionTonnes,
        });
      });
    }
    return rows;
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

export const buildProductionView = (tables: SourceTables): ProductionView => {
  const missing = emptySources([tables.countries, tables.minerals, tables.production]);
  if (missing.length > 0) {
    return {
      kind: 'unjoined',
      rows: tables.production.rows,
      reason: createInsufficientDataReason(missing),
    };
  }

  return joinProduction(tables).match<ProductionView>(
    (rows) => ({ kind: 'joined', rows }),
    (reason) => ({ kind: 'unjoined', rows: tables.production.rows, reason })
  );
};

export const buildSiteView = (tables: SourceTables): SiteView => {
  const missing = emptySources([tables.countries, tables.minerals, tables.sites]);
  if (missing.length > 0) {
    return {
      kind: 'unjoined',
      rows: tables.sites.rows,
      reason: createInsufficientDataReason(missing),
    };
  }

  return joinSites(tables).match<SiteView>(
    (rows) => ({ kind: 'joined', rows }),
    (reason) => ({ kind: 'unjoined', rows: tables.sites.rows, reason })
  );
};

/**
 * Rows of a view when it joined, otherwise an empty list.
 */
export const joinedRows = <Joined, Raw>(view: JoinedView<Joined, Raw>): readonly Joined[] =>
  view.kind === 'joined' ? view.rows : [];
