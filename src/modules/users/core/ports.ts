/**
 * Users Module - Port Interfaces
 */

import type { UserStoreError } from './errors.js';
import type { CreateUserInput, PublicUser, User, UserStoreSnapshot } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Password Hasher
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One-way password digests. Keeps the core free of crypto imports.
 */
export interface PasswordHasher {
  hash(password: string): Promise<string>;
  /**
   * Checks a password against a digest. Malformed digests verify as false.
   */
  verify(password: string, digest: string): Promise<boolean>;
}

// ─────────────────────────────────────────────────────────────────────────────
// User Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Persistence of account records.
 */
export interface UserStore {
  /**
   * Creates the store with only the seed administrator when it does not exist.
   * Never overwrites an existing store.
   * @returns true when this call created the store
   */
  initialize(): Promise<Result<boolean, UserStoreError>>;

  /**
   * Reads the whole store, initializing it first when absent.
   */
  load(): Promise<Result<UserStoreSnapshot, UserStoreError>>;

  /**
   * Replaces the whole store. A crash mid-write leaves the previous content intact.
   */
  save(store: UserStoreSnapshot): Promise<Result<void, UserStoreError>>;

  /**
   * Appends a user with the next id. Does not check username uniqueness.
   */
  createUser(input: CreateUserInput): Promise<Result<User, UserStoreError>>;

  /**
   * First user whose username or email equals `identifier` and whose digest
   * verifies `password`, or null.
   */
  authenticate(identifier: string, password: string): Promise<Result<User | null, UserStoreError>>;

  /**
   * Removes the user with this id. No account is protected at this layer.
   * @returns false when no such user existed
   */
  deleteUser(id: number): Promise<Result<boolean, UserStoreError>>;

  /**
   * All users, ordered by id, without password digests.
   */
  listUsers(): Promise<Result<PublicUser[], UserStoreError>>;

  /**
   * Releases underlying handles.
   */
  close(): Promise<void>;
}
