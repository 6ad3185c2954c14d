/**
 * Pure aggregations behind the dashboard charts and metrics.
 */

import type { CountryProfile, HeadlineMetrics, ProductionTotal } from './types.js';
import type { Country, JoinedProduction, Mineral } from '../../mineral-data/index.js';

const sumBy = (
  rows: readonly JoinedProduction[],
  keyOf: (row: JoinedProduction) => string
): Map<string, number> => {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const key = keyOf(row);
    totals.set(key, (totals.get(key) ?? 0) + (row.productionTonnes ?? 0));
  }
  return totals;
};

/**
 * Largest totals first; equal totals keep alphabetical order.
 */
const rankTotals = (totals: Map<string, number>, limit: number): ProductionTotal[] =>
  [...totals.entries()]
    .map(([name, productionTonnes]) => ({ name, productionTonnes }))
    .sort((a, b) => b.productionTonnes - a.productionTonnes || a.name.localeCompare(b.name))
    .slice(0, limit);

export const topMinerals = (rows: readonly JoinedProduction[], limit: number): ProductionTotal[] =>
  rankTotals(
    sumBy(rows, (row) => row.mineralName),
    limit
  );

export const topCountries = (rows: readonly JoinedProduction[], limit: number): ProductionTotal[] =>
  rankTotals(
    sumBy(rows, (row) => row.countryName),
    limit
  );

/**
 * Totals across all countries, missing figures counted as 0. Null when there
 * are no countries.
 */
export const headlineMetrics = (countries: readonly Country[]): HeadlineMetrics | null => {
  if (countries.length === 0) {
    return null;
  }

  return {
    totalMiningRevenueBillionUsd: countries.reduce(
      (sum, country) => sum + (country.miningRevenueBillionUsd ?? 0),
      0
    ),
    totalGdpBillionUsd: countries.reduce((sum, country) => sum + (country.gdpBillionUsd ?? 0), 0),
  };
};

/** Named countries in table order */
export const countryNames = (countries: readonly Country[]): string[] =>
  countries.flatMap((country) => (country.name === null ? [] : [country.name]));

/** `'All'` followed by distinct mineral names in table order */
export const mineralOptions = (minerals: readonly Mineral[]): string[] => [
  'All',
  ...new Set(minerals.flatMap((mineral) => (mineral.name === null ? [] : [mineral.name]))),
];

export const miningShareOfGdp = (
  miningRevenueBillionUsd: number | null,
  gdpBillionUsd: number | null
): number | null => {
  if (gdpBillionUsd === null || gdpBillionUsd === 0) {
    return null;
  }
  return ((miningRevenueBillionUsd ?? 0) / gdpBillionUsd) * 100;
};

/**
 * Profile of the first country with the given name, or null when there is
 * none.
 */
export const countryProfile = (
  countries: readonly Country[],
  rows: readonly JoinedProduction[],
  name: string
): CountryProfile | null => {
  const country = countries.find((candidate) => candidate.name === name);
  if (country === undefined) {
    return null;
  }

  return {
    countryName: name,
    gdpBillionUsd: country.gdpBillionUsd,
    miningRevenueBillionUsd: country.miningRevenueBillionUsd,
    miningShareOfGdpPercent: miningShareOfGdp(
      country.miningRevenueBillionUsd,
      country.gdpBillionUsd
    ),
    keyProjects: country.keyProjects,
    production: rows.filter((row) => row.countryName === name),
  };
};

export const compareCountries = (
  rows: readonly JoinedProduction[],
  names: readonly string[]
): JoinedProduction[] => {
  const selected = new Set(names);
  return rows.filter((row) => selected.has(row.countryName));
};
