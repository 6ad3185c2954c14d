import { err, ok } from 'neverthrow';
import { describe, it, expect } from 'vitest';

import {
  makeDataDirHealthChecker,
  makeSourceTablesHealthChecker,
  makeTimedCheck,
  makeUserStoreHealthChecker,
} from '@/modules/health/index.js';
import { createSourceReadError } from '@/modules/mineral-data/index.js';
import { createStorageCorruptError } from '@/modules/users/index.js';

import { COUNTRIES_CSV, makeSourceCsvs } from '../../fixtures/builders.js';
import { makeBrokenUserStore, makeInMemoryUserStore, makeSnapshot } from '../../fixtures/fakes.js';

describe('health checkers', () => {
  describe('makeTimedCheck', () => {
    it('reports healthy with latency when the probe returns null', async () => {
      const check = makeTimedCheck(async () => null, { name: 'probe' });

      const result = await check();

      expect(result.name).toBe('probe');
      expect(result.status).toBe('healthy');
      expect(result.critical).toBe(true);
      expect(typeof result.latencyMs).toBe('number');
    });

    it('reports the probe message when unhealthy', async () => {
      const check = makeTimedCheck(async () => 'broken', { name: 'probe', critical: false });

      const result = await check();

      expect(result.status).toBe('unhealthy');
      expect(result.message).toBe('broken');
      expect(result.critical).toBe(false);
    });

    it('fails after the timeout', async () => {
      const check = makeTimedCheck(
        () =>
          new Promise<null>((resolve) => {
            setTimeout(() => {
              resolve(null);
            }, 200);
          }),
        { name: 'slow', timeoutMs: 10 }
      );

      const result = await check();

      expect(result.status).toBe('unhealthy');
      expect(result.message).toBe('slow health check timed out after 10ms');
    });
  });

  describe('makeDataDirHealthChecker', () => {
    it('is healthy when the data directory is readable', async () => {
      const check = makeDataDirHealthChecker({ checkHealth: async () => ok(undefined) });

      const result = await check();

      expect(result.name).toBe('data-dir');
      expect(result.status).toBe('healthy');
    });

    it('is unhealthy when the data directory is not readable', async () => {
      const check = makeDataDirHealthChecker({
        checkHealth: async () => err(createSourceReadError('Data directory /srv/data is not readable')),
      });

      const result = await check();

      expect(result.status).toBe('unhealthy');
      expect(result.message).toBe('Data directory /srv/data is not readable');
    });
  });

  describe('makeUserStoreHealthChecker', () => {
    it('is healthy when the store loads', async () => {
      const check = makeUserStoreHealthChecker(makeInMemoryUserStore());

      const result = await check();

      expect(result.name).toBe('user-store');
      expect(result.status).toBe('healthy');
    });

    it('reports the error type of a corrupt store', async () => {
      const check = makeUserStoreHealthChecker(
        makeBrokenUserStore(createStorageCorruptError('users.json is not valid JSON'))
      );

      const result = await check();

      expect(result.status).toBe('unhealthy');
      expect(result.message).toBe('StorageCorruptError: users.json is not valid JSON');
    });
  });

  describe('makeSourceTablesHealthChecker', () => {
    it('is healthy when every source is loaded', async () => {
      const check = makeSourceTablesHealthChecker({
        load: async () => makeSnapshot(makeSourceCsvs()),
      });

      const result = await check();

      expect(result).toMatchObject({ name: 'sources', status: 'healthy', critical: false });
    });

    it('lists the sources that are not loaded', async () => {
      const check = makeSourceTablesHealthChecker({
        load: async () => makeSnapshot({ countries: COUNTRIES_CSV }),
      });

      const result = await check();

      expect(result.status).toBe('unhealthy');
      expect(result.critical).toBe(false);
      expect(result.message).toBe(
        'Not loaded: minerals.csv (missing), production_stats.csv (missing), sites.csv (missing)'
      );
    });
  });
});
