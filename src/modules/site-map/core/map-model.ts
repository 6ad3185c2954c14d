/**
 * Map model: markers for joined sites, coloured by mineral.
 */

import { ALL_MINERALS, DEFAULT_ZOOM, MINERAL_PALETTE } from './types.js';

import type { LegendEntry, MapMarker, MapModel } from './types.js';
import type { JoinedSite } from '../../mineral-data/index.js';

const tonnesFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

const isValidCoordinate = (value: number | null): value is number =>
  value !== null && Number.isFinite(value);

/**
 * Mean of the values, 0 for an empty list.
 */
const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Truncated tonnage with thousands separators. Null reads as 0.
 */
export const formatTonnes = (tonnes: number | null): string => {
  // `|| 0` folds -0 from truncating small negatives
  const whole = Math.trunc(tonnes ?? 0) || 0;
  return `${tonnesFormat.format(whole)} t`;
};

/**
 * Assigns palette colours to mineral names in first-seen order.
 */
export const assignColors = (mineralNames: readonly string[]): LegendEntry[] => {
  const legend: LegendEntry[] = [];
  const seen = new Set<string>();

  for (const mineralName of mineralNames) {
    if (seen.has(mineralName)) {
      continue;
    }
    seen.add(mineralName);
    const color = MINERAL_PALETTE[legend.length % MINERAL_PALETTE.length] ?? MINERAL_PALETTE[0];
    legend.push({ mineralName, color });
  }

  return legend;
};

/**
 * Builds the map for the given sites, or null when there are none.
 *
 * The filter matches mineral names exactly; `'All'` keeps every row. Rows
 * without valid coordinates still take part in colouring but get no marker.
 */
export const buildMapModel = (
  sites: readonly JoinedSite[],
  mineralFilter: string = ALL_MINERALS
): MapModel | null => {
  if (sites.length === 0) {
    return null;
  }

  const rows =
    mineralFilter === ALL_MINERALS
      ? sites
      : sites.filter((site) => site.mineralName === mineralFilter);

  const legend = assignColors(rows.map((row) => row.mineralName));
  const colorOf = new Map(legend.map((entry) => [entry.mineralName, entry.color]));

  const markers: MapMarker[] = [];
  for (const row of rows) {
    const { latitude, longitude } = row;
    if (!isValidCoordinate(latitude) || !isValidCoordinate(longitude)) {
      continue;
    }
    markers.push({
      latitude,
      longitude,
      color: colorOf.get(row.mineralName) ?? MINERAL_PALETTE[0],
      label: {
        siteName: row.siteName,
        mineralName: row.mineralName,
        countryName: row.countryName,
        production: formatTonnes(row.productionTonnes),
      },
    });
  }

  return {
    center: {
      latitude: mean(rows.map((row) => row.latitude).filter(isValidCoordinate)),
      longitude: mean(rows.map((row) => row.longitude).filter(isValidCoordinate)),
    },
    zoom: DEFAULT_ZOOM,
    markers,
    legend,
  };
};
