/**
 * Session Module - Domain Errors
 *
 * Errors raised by the session controller, plus the store and repository
 * errors it passes through.
 */

import type { ReplaceSourceError } from '../../mineral-data/index.js';
import type { UserStoreError } from '../../users/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Credential Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * No account matches the identifier and password.
 */
export interface InvalidCredentialsError {
  readonly type: 'InvalidCredentialsError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Registration Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface InvalidAdminCodeError {
  readonly type: 'InvalidAdminCodeError';
  readonly message: string;
}

export interface PasswordMismatchError {
  readonly type: 'PasswordMismatchError';
  readonly message: string;
}

export interface MissingFieldsError {
  readonly type: 'MissingFieldsError';
  readonly message: string;
}

export interface DuplicateUsernameError {
  readonly type: 'DuplicateUsernameError';
  readonly message: string;
  readonly username: string;
}

/**
 * The email is already the email or the username of another account.
 */
export interface DuplicateEmailError {
  readonly type: 'DuplicateEmailError';
  readonly message: string;
  readonly email: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Access Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface NotAuthenticatedError {
  readonly type: 'NotAuthenticatedError';
  readonly message: string;
}

/**
 * Logged in, but the role may not perform the operation.
 */
export interface ForbiddenError {
  readonly type: 'ForbiddenError';
  readonly message: string;
}

export interface PageNotReachableError {
  readonly type: 'PageNotReachableError';
  readonly message: string;
  readonly page: string;
}

/**
 * The seed administrator and the caller's own account cannot be deleted.
 */
export interface ProtectedAccountError {
  readonly type: 'ProtectedAccountError';
  readonly message: string;
  readonly userId: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type LoginError = InvalidCredentialsError | UserStoreError;

export type RegisterError =
  | InvalidAdminCodeError
  | PasswordMismatchError
  | MissingFieldsError
  | DuplicateUsernameError
  | DuplicateEmailError
  | UserStoreError;

export type AccessError = NotAuthenticatedError | ForbiddenError;

export type PageAccessError = NotAuthenticatedError | PageNotReachableError;

export type AdminOperationError = AccessError | ProtectedAccountError | UserStoreError;

export type ReplaceSourceOperationError = AccessError | ReplaceSourceError;

export type SessionError =
  | LoginError
  | RegisterError
  | PageAccessError
  | AdminOperationError
  | ReplaceSourceOperationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidCredentialsError = (): InvalidCredentialsError => ({
  type: 'InvalidCredentialsError',
  message: 'Invalid credentials',
});

export const createInvalidAdminCodeError = (): InvalidAdminCodeError => ({
  type: 'InvalidAdminCodeError',
  message: 'Invalid admin code',
});

export const createPasswordMismatchError = (): PasswordMismatchError => ({
  type: 'PasswordMismatchError',
  message: 'Passwords do not match',
});

export const createMissingFieldsError = (): MissingFieldsError => ({
  type: 'MissingFieldsError',
  message: 'Username and password are required',
});

export const createDuplicateUsernameError = (username: string): DuplicateUsernameError => ({
  type: 'DuplicateUsernameError',
  message: `Username '${username}' already exists`,
  username,
});

export const createDuplicateEmailError = (email: string): DuplicateEmailError => ({
  type: 'DuplicateEmailError',
  message: `Email '${email}' is already in use`,
  email,
});

export const createNotAuthenticatedError = (): NotAuthenticatedError => ({
  type: 'NotAuthenticatedError',
  message: 'Login required',
});

export const createForbiddenError = (operation: string): ForbiddenError => ({
  type: 'ForbiddenError',
  message: `Only administrators may ${operation}`,
});

export const createPageNotReachableError = (page: string): PageNotReachableError => ({
  type: 'PageNotReachableError',
  message: `Page '${page}' is not available to this account`,
  page,
});

export const createProtectedAccountError = (userId: number, reason: string): ProtectedAccountError => ({
  type: 'ProtectedAccountError',
  message: `User ${String(userId)} cannot be deleted: ${reason}`,
  userId,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps every error the session routes can return to an HTTP status code.
 */
export const SESSION_ERROR_HTTP_STATUS: Record<SessionError['type'], number> = {
  InvalidCredentialsError: 401,
  NotAuthenticatedError: 401,
  ForbiddenError: 403,
  PageNotReachableError: 403,
  InvalidAdminCodeError: 400,
  PasswordMismatchError: 400,
  MissingFieldsError: 400,
  InvalidSourceNameError: 400,
  DuplicateUsernameError: 409,
  DuplicateEmailError: 409,
  UsernameTakenError: 409,
  ProtectedAccountError: 409,
  StorageCorruptError: 500,
  StorageIoError: 500,
  SourceWriteError: 500,
};

export const getHttpStatusForError = (error: SessionError): number =>
  SESSION_ERROR_HTTP_STATUS[error.type];
