/**
 * Mineral Data Module - Domain Types
 *
 * Four source tables (countries, minerals, production, sites) and the joined
 * views derived from them.
 */

import type { JoinSkipReason } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Sources
// ─────────────────────────────────────────────────────────────────────────────

export const SOURCE_NAMES = ['countries', 'minerals', 'production', 'sites'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/** Canonical file name of each source; uploads must use exactly these names */
export const SOURCE_FILES: Readonly<Record<SourceName, string>> = {
  countries: 'countries.csv',
  minerals: 'minerals.csv',
  production: 'production_stats.csv',
  sites: 'sites.csv',
};

/** Columns each source is expected to carry */
export const SOURCE_COLUMNS = {
  countries: [
    'CountryID',
    'CountryName',
    'GDP_BillionUSD',
    'MiningRevenue_BillionUSD',
    'KeyProjects',
  ],
  minerals: ['MineralID', 'MineralName', 'Description'],
  production: ['CountryID', 'MineralID', 'Production_tonnes', 'ExportValue_BillionUSD'],
  sites: [
    'SiteID',
    'SiteName',
    'CountryID',
    'MineralID',
    'Latitude',
    'Longitude',
    'Production_tonnes',
  ],
} as const satisfies Record<SourceName, readonly string[]>;

/**
 * Maps an uploaded file name to its source, or null when it is not canonical.
 */
export const resolveSourceName = (filename: string): SourceName | null =>
  SOURCE_NAMES.find((name) => SOURCE_FILES[name] === filename) ?? null;

// ─────────────────────────────────────────────────────────────────────────────
// Source Rows
// ─────────────────────────────────────────────────────────────────────────────
// Cells that are empty or do not parse are null, never zero.

export interface Country {
  readonly id: number | null;
  readonly name: string | null;
  readonly gdpBillionUsd: number | null;
  readonly miningRevenueBillionUsd: number | null;
  readonly keyProjects: string | null;
}

export interface Mineral {
  readonly id: number | null;
  readonly name: string | null;
  readonly description: string | null;
}

export interface ProductionRecord {
  readonly countryId: number | null;
  readonly mineralId: number | null;
  readonly productionTonnes: number | null;
  readonly exportValueBillionUsd: number | null;
}

export interface Site {
  readonly id: number | null;
  readonly name: string | null;
  readonly countryId: number | null;
  readonly mineralId: number | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly productionTonnes: number | null;
}

export interface SourceRows {
  countries: Country;
  minerals: Mineral;
  production: ProductionRecord;
  sites: Site;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Why a table holds what it holds. Only `loaded` tables carry rows.
 */
export type TableStatus =
  | { readonly kind: 'loaded' }
  | { readonly kind: 'missing' }
  | { readonly kind: 'unreadable'; readonly reason: string }
  | { readonly kind: 'malformed'; readonly reason: string };

export interface SourceTable<S extends SourceName> {
  readonly source: S;
  readonly file: string;
  /** Header as found in the file, or the expected columns when nothing was loaded */
  readonly columns: readonly string[];
  readonly rows: readonly SourceRows[S][];
  readonly status: TableStatus;
}

export interface SourceTables {
  readonly countries: SourceTable<'countries'>;
  readonly minerals: SourceTable<'minerals'>;
  readonly production: SourceTable<'production'>;
  readonly sites: SourceTable<'sites'>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Joined Views
// ─────────────────────────────────────────────────────────────────────────────
// Only countries and minerals with both an id and a name take part in a join.

export interface CountryColumns {
  readonly countryId: number;
  readonly countryName: string;
  readonly gdpBillionUsd: number | null;
  readonly miningRevenueBillionUsd: number | null;
  readonly keyProjects: string | null;
}

export interface MineralColumns {
  readonly mineralId: number;
  readonly mineralName: string;
  readonly description: string | null;
}

export interface JoinedProduction extends CountryColumns, MineralColumns {
  readonly productionTonnes: number | null;
  readonly exportValueBillionUsd: number | null;
}

export interface JoinedSite extends CountryColumns, MineralColumns {
  readonly siteId: number | null;
  readonly siteName: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly productionTonnes: number | null;
}

/**
 * A joined view, or the raw rows with the reason the join did not happen.
 * Consumers treat `unjoined` as insufficient data.
 */
export type JoinedView<Joined, Raw> =
  | { readonly kind: 'joined'; readonly rows: readonly Joined[] }
  | { readonly kind: 'unjoined'; readonly rows: readonly Raw[]; readonly reason: JoinSkipReason };

export type ProductionView = JoinedView<JoinedProduction, ProductionRecord>;
export type SiteView = JoinedView<JoinedSite, Site>;

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable result of one load. A refresh produces a new snapshot.
 */
export interface DataSnapshot {
  readonly tables: SourceTables;
  readonly views: {
    readonly production: ProductionView;
    readonly sites: SiteView;
  };
  /** ISO-8601 time the sources were read */
  readonly loadedAt: string;
}
