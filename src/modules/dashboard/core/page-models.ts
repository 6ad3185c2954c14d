/**
 * Page models assembled from a data snapshot.
 */

import {
  compareCountries,
  countryNames,
  countryProfile,
  headlineMetrics,
  mineralOptions,
  topCountries,
  topMinerals,
} from './aggregations.js';
import {
  DEFAULT_COMPARISON_SIZE,
  FULL_DASHBOARD_TOP_LIMIT,
  INVESTOR_TOP_LIMIT,
  type FullDashboard,
  type InvestorDashboard,
  type PageQuery,
  type SourceSummary,
} from './types.js';
import { joinedRows } from '../../mineral-data/core/join.js';
import { SOURCE_NAMES, type DataSnapshot } from '../../mineral-data/core/types.js';
import { buildMapModel } from '../../site-map/core/map-model.js';
import { ALL_MINERALS } from '../../site-map/core/types.js';

export const buildInvestorDashboard = (
  snapshot: DataSnapshot,
  query: PageQuery = {}
): InvestorDashboard => {
  const production = joinedRows(snapshot.views.production);
  const mineralFilter = query.mineral ?? ALL_MINERALS;

  return {
    page: 'Investor',
    topMinerals: topMinerals(production, INVESTOR_TOP_LIMIT),
    topCountries: topCountries(production, INVESTOR_TOP_LIMIT),
    mineralOptions: mineralOptions(snapshot.tables.minerals.rows),
    mineralFilter,
    map: buildMapModel(joinedRows(snapshot.views.sites), mineralFilter),
  };
};

export const buildFullDashboard = (snapshot: DataSnapshot, query: PageQuery = {}): FullDashboard => {
  const countries = snapshot.tables.countries.rows;
  const production = joinedRows(snapshot.views.production);
  const names = countryNames(countries);
  const mineralFilter = query.mineral ?? ALL_MINERALS;
  const selectedCountry = query.country ?? names[0];
  const compared = query.compare ?? names.slice(0, DEFAULT_COMPARISON_SIZE);

  return {
    metrics: headlineMetrics(countries),
    topMinerals: topMinerals(production, FULL_DASHBOARD_TOP_LIMIT),
    mineralOptions: mineralOptions(snapshot.tables.minerals.rows),
    mineralFilter,
    map: buildMapModel(joinedRows(snapshot.views.sites), mineralFilter),
    countries: names,
    profile:
      selectedCountry === undefined ? null : countryProfile(countries, production, selectedCountry),
    comparison: { countries: compared, rows: compareCountries(production, compared) },
  };
};

/**
 * Load status of each source, for the administrator page.
 */
export const summarizeSources = (snapshot: DataSnapshot): SourceSummary[] =>
  SOURCE_NAMES.map((name) => {
    const table = snapshot.tables[name];
    return {
      source: name,
      file: table.file,
      status: table.status,
      rowCount: table.rows.length,
    };
  });
