/**
 * User store health checker
 *
 * Loads the store; a corrupt or unreadable store makes the service unready
 * because no one can log in.
 */

import { makeTimedCheck } from './timed-check.js';

import type { UserStore } from '../../../users/core/ports.js';
import type { HealthChecker } from '../../core/ports.js';

export interface UserStoreHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeUserStoreHealthChecker = (
  userStore: Pick<UserStore, 'load'>,
  options: UserStoreHealthCheckerOptions = {}
): HealthChecker =>
  makeTimedCheck(
    async () => {
      const result = await userStore.load();
      return result.isOk() ? null : `${result.error.type}: ${result.error.message}`;
    },
    {
      name: options.name ?? 'user-store',
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    }
  );
