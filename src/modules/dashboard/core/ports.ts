/**
 * Dashboard Module - Port Interfaces
 */

import type { PublicUser } from '../../users/core/types.js';
import type { AdminOperationError, PageAccessError } from '../../session/core/errors.js';
import type { DashboardPage, Page } from '../../session/core/types.js';
import type { Result } from 'neverthrow';

/**
 * What a page request needs from the caller's session.
 * `SessionController` satisfies it.
 */
export interface PageViewer {
  openPage(page: Page): Result<DashboardPage, PageAccessError>;
  listUsers(): Promise<Result<PublicUser[], AdminOperationError>>;
}
