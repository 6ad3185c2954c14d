/**
 * Health Module - Ports
 */

import type { HealthCheckResult } from './types.js';

/**
 * Probes one dependency. A checker that rejects is reported as a critical
 * failure named `unknown`.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;

/** Source of the current time, replaced in tests */
export type Clock = () => Date;
