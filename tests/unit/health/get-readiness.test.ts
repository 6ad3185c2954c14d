import { describe, it, expect } from 'vitest';

import { getReadiness } from '@/modules/health/core/usecases/get-readiness.js';

import type { HealthChecker } from '@/modules/health/core/ports.js';

describe('getReadiness', () => {
  const clock = {
    startedAt: Date.parse('2024-01-01T00:00:00.000Z'),
    now: () => new Date('2024-01-01T00:01:40.500Z'),
  };

  describe('basic status', () => {
    it('returns ok when all checks are healthy', async () => {
      const checkers: HealthChecker[] = [
        async () => ({ name: 'data-dir', status: 'healthy' }),
        async () => ({ name: 'user-store', status: 'healthy' }),
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.status).toBe('ok');
      expect(result.checks).toHaveLength(2);
      expect(result.checks[0]?.name).toBe('data-dir');
      expect(result.checks[0]?.status).toBe('healthy');
    });

    it('returns ok when no checkers are configured', async () => {
      const result = await getReadiness({ checkers: [], ...clock });

      expect(result.status).toBe('ok');
      expect(result.checks).toHaveLength(0);
    });

    it('reports whole seconds since the start and the current time', async () => {
      const result = await getReadiness({ checkers: [], ...clock });

      expect(result.uptime).toBe(100);
      expect(result.timestamp).toBe('2024-01-01T00:01:40.500Z');
    });

    it('includes version if provided', async () => {
      const result = await getReadiness({ checkers: [], version: '1.0.0', ...clock });
      expect(result.version).toBe('1.0.0');
    });
  });

  describe('critical checks', () => {
    it('returns unhealthy when the user store check fails', async () => {
      const checkers: HealthChecker[] = [
        async () => ({ name: 'data-dir', status: 'healthy', critical: true }),
        async () => ({ name: 'user-store', status: 'unhealthy', critical: true }),
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.status).toBe('unhealthy');
    });

    it('handles rejected checks as critical failures', async () => {
      const checkers: HealthChecker[] = [
        async () => {
          throw new Error('EACCES: permission denied');
        },
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.status).toBe('unhealthy');
      expect(result.checks[0]).toEqual({
        name: 'unknown',
        status: 'unhealthy',
        message: 'EACCES: permission denied',
        critical: true,
      });
    });

    it('names non-Error rejections generically', async () => {
      const checkers: HealthChecker[] = [
        async () => {
          // eslint-disable-next-line @typescript-eslint/only-throw-error -- Testing non-Error exception handling
          throw 'string error';
        },
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.checks[0]?.message).toBe('Check failed');
    });
  });

  describe('non-critical checks', () => {
    it('returns degraded when only non-critical checks are unhealthy', async () => {
      const checkers: HealthChecker[] = [
        async () => ({ name: 'data-dir', status: 'healthy', critical: true }),
        async () => ({ name: 'uploads', status: 'unhealthy', critical: false }),
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.status).toBe('degraded');
    });

    it('prefers unhealthy over degraded when both kinds fail', async () => {
      const checkers: HealthChecker[] = [
        async () => ({ name: 'user-store', status: 'unhealthy', critical: true }),
        async () => ({ name: 'uploads', status: 'unhealthy', critical: false }),
      ];

      const result = await getReadiness({ checkers, ...clock });

      expect(result.status).toBe('unhealthy');
    });
  });
});
