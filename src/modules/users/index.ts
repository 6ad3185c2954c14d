/**
 * Users Module - Public API
 *
 * Account storage (JSON file or SQLite) and password hashing.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type { Role, User, PublicUser, UserStoreSnapshot, CreateUserInput } from './core/types.js';

export {
  ROLES,
  SEED_ADMIN_ID,
  SEED_ADMIN_USERNAME,
  DEFAULT_EMAIL_DOMAIN,
  isRole,
  defaultEmailFor,
  resolveEmail,
  toPublicUser,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  UserStoreError,
  StorageCorruptError,
  StorageIoError,
  UsernameTakenError,
} from './core/errors.js';

export {
  createStorageCorruptError,
  createStorageIoError,
  createUsernameTakenError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports & Logic
// ─────────────────────────────────────────────────────────────────────────────

export type { UserStore, PasswordHasher } from './core/ports.js';

export {
  createSeedStore,
  appendUser,
  removeUser,
  matchIdentifier,
  findSnapshotProblems,
} from './core/logic.js';

export { findAuthenticatedUser } from './core/usecases/authenticate-user.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Stores
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeJsonFileUserStore,
  USERS_FILE_NAME,
  type JsonFileUserStoreOptions,
} from './shell/repo/json-file-store.js';

export { makeSqliteUserStore, type SqliteUserStoreOptions } from './shell/repo/sqlite-store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Crypto
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeScryptPasswordHasher,
  type ScryptHasherOptions,
} from './shell/crypto/scrypt-hasher.js';
