import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for a health check in milliseconds */
export const DEFAULT_CHECK_TIMEOUT_MS = 3000;

export interface TimedCheckOptions {
  name: string;
  timeoutMs?: number;
  critical?: boolean;
}

/**
 * Wraps a probe into a HealthChecker that measures latency and fails after
 * the timeout. The probe returns an error message, or null when healthy.
 */
export const makeTimedCheck = (
  probe: () => Promise<string | null>,
  options: TimedCheckOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_CHECK_TIMEOUT_MS, critical = true } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`${name} health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      const problem = await Promise.race([probe(), timeoutPromise]);
      const latencyMs = Date.now() - startTime;

      return problem === null
        ? { name, status: 'healthy', latencyMs, critical }
        : { name, status: 'unhealthy', message: problem, latencyMs, critical };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : `Unknown ${name} error`,
        latencyMs: Date.now() - startTime,
        critical,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
