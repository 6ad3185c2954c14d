/**
 * Login Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidCredentialsError, type LoginError } from '../errors.js';

import type { UserStore } from '../../../users/core/ports.js';
import type { User } from '../../../users/core/types.js';

export interface LoginUserDeps {
  userStore: UserStore;
}

/**
 * Finds the account for a username or email and password. The identifier is
 * trimmed; the password is used as given. The store is always consulted, so a
 * broken store is reported even for blank credentials.
 */
export async function loginUser(
  deps: LoginUserDeps,
  identifier: string,
  password: string
): Promise<Result<User, LoginError>> {
  const trimmed = identifier.trim();
  const result = await deps.userStore.authenticate(trimmed, password);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null || trimmed === '' || password === '') {
    return err(createInvalidCredentialsError());
  }

  return ok(result.value);
}
