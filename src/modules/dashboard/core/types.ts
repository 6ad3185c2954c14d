/**
 * Dashboard Module - Domain Types
 */

import type { JoinedProduction, SourceName, TableStatus } from '../../mineral-data/index.js';
import type { MapModel } from '../../site-map/index.js';
import type { PublicUser } from '../../users/index.js';

/** Bars on the investor charts */
export const INVESTOR_TOP_LIMIT = 6;

/** Bars on the researcher and administrator mineral chart */
export const FULL_DASHBOARD_TOP_LIMIT = 8;

/** Countries pre-selected for comparison when none are requested */
export const DEFAULT_COMPARISON_SIZE = 2;

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

/** Total production for one mineral or country */
export interface ProductionTotal {
  readonly name: string;
  readonly productionTonnes: number;
}

export interface HeadlineMetrics {
  readonly totalMiningRevenueBillionUsd: number;
  readonly totalGdpBillionUsd: number;
}

export interface CountryProfile {
  readonly countryName: string;
  readonly gdpBillionUsd: number | null;
  readonly miningRevenueBillionUsd: number | null;
  /** Mining revenue as a percentage of GDP; null without a positive GDP figure */
  readonly miningShareOfGdpPercent: number | null;
  readonly keyProjects: string | null;
  readonly production: readonly JoinedProduction[];
}

export interface CountryComparison {
  readonly countries: readonly string[];
  readonly rows: readonly JoinedProduction[];
}

export interface SourceSummary {
  readonly source: SourceName;
  readonly file: string;
  readonly status: TableStatus;
  readonly rowCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Page Models
// ─────────────────────────────────────────────────────────────────────────────

export interface PageQuery {
  /** Map filter; `'All'` when absent */
  readonly mineral?: string;
  /** Country shown in the profile; the first country when absent */
  readonly country?: string;
  /** Countries to compare; the first two when absent */
  readonly compare?: readonly string[];
}

export interface InvestorDashboard {
  readonly page: 'Investor';
  readonly topMinerals: readonly ProductionTotal[];
  readonly topCountries: readonly ProductionTotal[];
  readonly mineralOptions: readonly string[];
  readonly mineralFilter: string;
  readonly map: MapModel | null;
}

/** Shared by the researcher and administrator pages */
export interface FullDashboard {
  readonly metrics: HeadlineMetrics | null;
  readonly topMinerals: readonly ProductionTotal[];
  readonly mineralOptions: readonly string[];
  readonly mineralFilter: string;
  readonly map: MapModel | null;
  readonly countries: readonly string[];
  readonly profile: CountryProfile | null;
  readonly comparison: CountryComparison;
}

export interface ResearcherDashboard extends FullDashboard {
  readonly page: 'Researcher';
}

export interface AdminDashboard extends FullDashboard {
  readonly page: 'Admin';
  readonly users: readonly PublicUser[];
  readonly sources: readonly SourceSummary[];
}

export type PageModel = InvestorDashboard | ResearcherDashboard | AdminDashboard;
