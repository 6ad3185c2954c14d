/**
 * Users Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Persisted store exists but does not match the expected schema.
 * Fatal to every authentication operation until the store is repaired.
 */
export interface StorageCorruptError {
  readonly type: 'StorageCorruptError';
  readonly message: string;
  readonly details?: string[];
  readonly cause?: unknown;
}

/**
 * Reading or writing the store failed.
 */
export interface StorageIoError {
  readonly type: 'StorageIoError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A store enforcing unique usernames rejected an insert.
 */
export interface UsernameTakenError {
  readonly type: 'UsernameTakenError';
  readonly message: string;
  readonly username: string;
}

/**
 * All possible user store errors.
 */
export type UserStoreError = StorageCorruptError | StorageIoError | UsernameTakenError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createStorageCorruptError = (
  message: string,
  details?: string[],
  cause?: unknown
): StorageCorruptError => ({
  type: 'StorageCorruptError',
  message,
  ...(details !== undefined && { details }),
  ...(cause !== undefined && { cause }),
});

export const createStorageIoError = (message: string, cause?: unknown): StorageIoError => ({
  type: 'StorageIoError',
  message,
  ...(cause !== undefined && { cause }),
});

export const createUsernameTakenError = (username: string): UsernameTakenError => ({
  type: 'UsernameTakenError',
  message: `Username '${username}' already exists`,
  username,
});
