/**
 * Snapshot assembly.
 */

import { buildProductionView, buildSiteView } from './join.js';

import type { DataSnapshot, SourceTables } from './types.js';

/**
 * Freezes a value and everything reachable from it.
 */
export const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

/**
 * Joins the tables and freezes the result.
 */
export const buildSnapshot = (tables: SourceTables, loadedAt: string): DataSnapshot =>
  deepFreeze({
    tables,
    views: {
      production: buildProductionView(tables),
      sites: buildSiteView(tables),
    },
    loadedAt,
  });
