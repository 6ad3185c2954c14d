/**
 * Authenticate User Use Case
 *
 * Shared by every UserStore adapter: walks the identifier matches in order and
 * returns the first whose digest verifies.
 */

import { matchIdentifier } from '../logic.js';

import type { PasswordHasher } from '../ports.js';
import type { User } from '../types.js';

export interface AuthenticateUserDeps {
  hasher: PasswordHasher;
}

export const findAuthenticatedUser = async (
  deps: AuthenticateUserDeps,
  users: readonly User[],
  identifier: string,
  password: string
): Promise<User | null> => {
  for (const candidate of matchIdentifier(users, identifier)) {
    if (await deps.hasher.verify(password, candidate.passwordHash)) {
      return candidate;
    }
  }

  return null;
};
