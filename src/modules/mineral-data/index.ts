/**
 * Mineral Data Module - Public API
 *
 * Loads the country, mineral, production and site tables and joins them.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  SOURCE_NAMES,
  SOURCE_FILES,
  SOURCE_COLUMNS,
  resolveSourceName,
  type SourceName,
  type Country,
  type Mineral,
  type ProductionRecord,
  type Site,
  type SourceRows,
  type TableStatus,
  type SourceTable,
  type SourceTables,
  type CountryColumns,
  type MineralColumns,
  type JoinedProduction,
  type JoinedSite,
  type JoinedView,
  type ProductionView,
  type SiteView,
  type DataSnapshot,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createInvalidSourceNameError,
  createSourceWriteError,
  createSourceReadError,
  createSourceMissingError,
  createInsufficientDataReason,
  createMissingJoinColumnError,
  REPLACE_SOURCE_ERROR_HTTP_STATUS,
  type InvalidSourceNameError,
  type SourceWriteError,
  type SourceReadError,
  type SourceMissingError,
  type SourceAccessError,
  type ReplaceSourceError,
  type InsufficientDataReason,
  type MissingJoinColumnError,
  type JoinSkipReason,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseNumericCell,
  parseTextCell,
  buildSourceTable,
  emptySourceTable,
  type RawTable,
} from './core/parse-tables.js';

export {
  joinProduction,
  joinSites,
  buildProductionView,
  buildSiteView,
  joinedRows,
} from './core/join.js';

export { buildSnapshot, deepFreeze } from './core/snapshot.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { MineralDataRepository, SourceFileStore } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { decodeCsv } from './shell/repo/csv-decoder.js';
export { makeFsSourceStore, type FsSourceStoreOptions } from './shell/repo/fs-source-store.js';
export {
  makeCsvMineralDataRepo,
  type CsvMineralDataRepoOptions,
} from './shell/repo/csv-repo.js';
