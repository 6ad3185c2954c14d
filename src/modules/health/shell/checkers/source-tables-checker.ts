/**
 * Source tables health checker
 *
 * Non-critical: a source that is missing, unreadable or malformed leaves its
 * dashboards empty, so the service reports itself degraded but stays ready.
 */

import { SOURCE_FILES, SOURCE_NAMES } from '../../../mineral-data/core/types.js';
import { makeTimedCheck } from './timed-check.js';

import type { MineralDataRepository } from '../../../mineral-data/core/ports.js';
import type { HealthChecker } from '../../core/ports.js';

export interface SourceTablesHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeSourceTablesHealthChecker = (
  dataRepository: Pick<MineralDataRepository, 'load'>,
  options: SourceTablesHealthCheckerOptions = {}
): HealthChecker =>
  makeTimedCheck(
    async () => {
      const { tables } = await dataRepository.load();
      const notLoaded = SOURCE_NAMES.filter(
        (source) => tables[source].status.kind !== 'loaded'
      ).map((source) => `${SOURCE_FILES[source]} (${tables[source].status.kind})`);

      return notLoaded.length === 0 ? null : `Not loaded: ${notLoaded.join(', ')}`;
    },
    {
      name: options.name ?? 'sources',
      critical: false,
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    }
  );
