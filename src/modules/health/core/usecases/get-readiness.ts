/**
 * Get Readiness Use Case
 *
 * Runs every checker at once and folds the results into one report.
 */

import { evaluateReadiness, mapCheckResults } from '../logic.js';

import type { Clock, HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  version?: string | undefined;
  /** Start of the uptime count, in epoch milliseconds */
  startedAt: number;
  now?: Clock;
}

export async function getReadiness(deps: GetReadinessDeps): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((check) => check()));
  const now = deps.now?.() ?? new Date();
  const uptime = Math.max(0, Math.floor((now.getTime() - deps.startedAt) / 1000));

  return evaluateReadiness(mapCheckResults(settled), uptime, now.toISOString(), deps.version);
}
