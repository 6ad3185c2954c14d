/**
 * Register User Use Case
 *
 * Validates a registration form and creates the account. Never logs the
 * caller in.
 */

import { err, ok, type Result } from 'neverthrow';

import { resolveEmail, toPublicUser, type PublicUser } from '../../../users/core/types.js';
import {
  createDuplicateEmailError,
  createDuplicateUsernameError,
  createInvalidAdminCodeError,
  createMissingFieldsError,
  createPasswordMismatchError,
  type RegisterError,
} from '../errors.js';

import type { UserStore } from '../../../users/core/ports.js';
import type { RegisterInput } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RegisterUserDeps {
  userStore: UserStore;
  /** Secret an Administrator registration must present */
  adminSecret: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Checks run in a fixed order and the first failure wins:
 * 1. admin code, when registering an Administrator
 * 2. password confirmation
 * 3. username and password present
 * 4. username not taken
 * 5. email not used by another account, as email or username
 */
export async function registerUser(
  deps: RegisterUserDeps,
  input: RegisterInput
): Promise<Result<PublicUser, RegisterError>> {
  const { userStore, adminSecret } = deps;

  if (input.role === 'Administrator' && input.adminCode !== adminSecret) {
    return err(createInvalidAdminCodeError());
  }

  if (input.password !== input.confirmPassword) {
    return err(createPasswordMismatchError());
  }

  // Usernames are stored exactly as typed
  const { username } = input;
  if (username === '' || input.password === '') {
    return err(createMissingFieldsError());
  }

  const loaded = await userStore.load();
  if (loaded.isErr()) {
    return err(loaded.error);
  }
  const { users } = loaded.value;

  if (users.some((user) => user.username === username)) {
    return err(createDuplicateUsernameError(username));
  }

  const email = resolveEmail(username, input.email?.trim());
  if (users.some((user) => user.email === email || user.username === email)) {
    return err(createDuplicateEmailError(email));
  }

  const created = await userStore.createUser({
    username,
    password: input.password,
    role: input.role,
    email,
  });

  if (created.isErr()) {
    // A concurrent registration can take the name between the check and the insert
    if (created.error.type === 'UsernameTakenError') {
      return err(createDuplicateUsernameError(username));
    }
    return err(created.error);
  }

  return ok(toPublicUser(created.value));
}
