/**
 * Data directory health checker
 *
 * Verifies the directory holding the source CSV files is readable. Missing
 * source files are not a failure: the dashboards degrade to empty tables.
 */

import { makeTimedCheck } from './timed-check.js';

import type { MineralDataRepository } from '../../../mineral-data/core/ports.js';
import type { HealthChecker } from '../../core/ports.js';

export interface DataDirHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeDataDirHealthChecker = (
  dataRepository: Pick<MineralDataRepository, 'checkHealth'>,
  options: DataDirHealthCheckerOptions = {}
): HealthChecker =>
  makeTimedCheck(
    async () => {
      const result = await dataRepository.checkHealth();
      return result.isOk() ? null : result.error.message;
    },
    {
      name: options.name ?? 'data-dir',
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    }
  );
