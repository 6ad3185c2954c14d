/**
 * Require Administrator Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createForbiddenError,
  createNotAuthenticatedError,
  type AccessError,
} from '../errors.js';
import { isLoggedIn, type LoggedIn, type SessionState } from '../types.js';

/**
 * Passes only for a logged-in Administrator.
 *
 * @param operation - Named in the forbidden message
 */
export function requireAdmin(state: SessionState, operation: string): Result<LoggedIn, AccessError> {
  if (!isLoggedIn(state)) {
    return err(createNotAuthenticatedError());
  }

  if (state.role !== 'Administrator') {
    return err(createForbiddenError(operation));
  }

  return ok(state);
}
