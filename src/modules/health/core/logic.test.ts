import { describe, it, expect } from 'vitest';

import { determineOverallStatus, evaluateReadiness, mapCheckResults } from './logic.js';
import { type HealthCheckResult } from './types.js';

describe('Health Core Logic', () => {
  describe('mapCheckResults', () => {
    it('returns values for fulfilled promises', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'fulfilled', value: { name: 'data-dir', status: 'healthy' } },
        { status: 'fulfilled', value: { name: 'user-store', status: 'unhealthy' } },
      ];

      expect(mapCheckResults(input)).toEqual([
        { name: 'data-dir', status: 'healthy' },
        { name: 'user-store', status: 'unhealthy' },
      ]);
    });

    it('maps rejected promises to critical unhealthy results', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'rejected', reason: new Error('EACCES: permission denied') },
      ];

      expect(mapCheckResults(input)).toEqual([
        {
          name: 'unknown',
          status: 'unhealthy',
          message: 'EACCES: permission denied',
          critical: true,
        },
      ]);
    });
  });

  describe('determineOverallStatus', () => {
    it('is degraded when only non-critical checks fail', () => {
      expect(
        determineOverallStatus([
          { name: 'data-dir', status: 'healthy' },
          { name: 'extra', status: 'unhealthy', critical: false },
        ])
      ).toBe('degraded');
    });

    it('treats checks without a critical flag as critical', () => {
      expect(determineOverallStatus([{ name: 'user-store', status: 'unhealthy' }])).toBe(
        'unhealthy'
      );
    });
  });

  describe('evaluateReadiness', () => {
    const timestamp = '2024-01-01T00:00:00.000Z';
    const uptime = 100;

    it('returns ok when all checks are healthy', () => {
      const checks: HealthCheckResult[] = [
        { name: 'data-dir', status: 'healthy' },
        { name: 'user-store', status: 'healthy' },
      ];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result).toEqual({ status: 'ok', timestamp, uptime, checks });
    });

    it('returns unhealthy when a critical check is unhealthy', () => {
      const checks: HealthCheckResult[] = [
        { name: 'data-dir', status: 'healthy' },
        { name: 'user-store', status: 'unhealthy', critical: true },
      ];

      expect(evaluateReadiness(checks, uptime, timestamp).status).toBe('unhealthy');
    });

    it('includes version if provided', () => {
      expect(evaluateReadiness([], uptime, timestamp, '0.1.0').version).toBe('0.1.0');
    });
  });
});
