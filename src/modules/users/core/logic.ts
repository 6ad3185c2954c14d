/**
 * Users Module - Pure store transformations
 *
 * Adapters persist the snapshots these functions produce; nothing here does I/O.
 */

import {
  SEED_ADMIN_ID,
  SEED_ADMIN_USERNAME,
  defaultEmailFor,
  resolveEmail,
  type Role,
  type User,
  type UserStoreSnapshot,
} from './types.js';

/**
 * Store holding only the seeded administrator.
 */
export const createSeedStore = (passwordHash: string, createdAt: string): UserStoreSnapshot => ({
  users: [
    {
      id: SEED_ADMIN_ID,
      username: SEED_ADMIN_USERNAME,
      passwordHash,
      role: 'Administrator',
      email: defaultEmailFor(SEED_ADMIN_USERNAME),
      createdAt,
    },
  ],
  nextId: SEED_ADMIN_ID + 1,
});

export interface AppendUserInput {
  username: string;
  passwordHash: string;
  role: Role;
  email?: string | undefined;
  createdAt: string;
}

/**
 * Appends a user under `nextId` and advances the counter.
 */
export const appendUser = (
  store: UserStoreSnapshot,
  input: AppendUserInput
): { store: UserStoreSnapshot; user: User } => {
  const user: User = {
    id: store.nextId,
    username: input.username,
    passwordHash: input.passwordHash,
    role: input.role,
    email: resolveEmail(input.username, input.email),
    createdAt: input.createdAt,
  };

  return {
    store: { users: [...store.users, user], nextId: store.nextId + 1 },
    user,
  };
};

/**
 * Drops the user with `id`. The id counter is left untouched so ids are never reused.
 */
export const removeUser = (
  store: UserStoreSnapshot,
  id: number
): { store: UserStoreSnapshot; removed: boolean } => {
  const users = store.users.filter((user) => user.id !== id);
  return {
    store: { users, nextId: store.nextId },
    removed: users.length !== store.users.length,
  };
};

/**
 * Users whose username or email equals the identifier (exact, case-sensitive),
 * in store order.
 */
export const matchIdentifier = (users: readonly User[], identifier: string): User[] =>
  users.filter((user) => user.username === identifier || user.email === identifier);

/**
 * Structural problems that make a snapshot unusable.
 */
export const findSnapshotProblems = (store: UserStoreSnapshot): string[] => {
  const problems: string[] = [];
  const seen = new Set<number>();

  for (const user of store.users) {
    if (seen.has(user.id)) {
      problems.push(`duplicate user id ${String(user.id)}`);
    }
    seen.add(user.id);

    if (user.id >= store.nextId) {
      problems.push(
        `user id ${String(user.id)} is not below next_id ${String(store.nextId)}`
      );
    }
  }

  return problems;
};
