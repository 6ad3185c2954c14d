/**
 * Users Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Roles
// ─────────────────────────────────────────────────────────────────────────────

/** Closed set of account roles, in the order they are offered at registration. */
export const ROLES = ['Investor', 'Researcher', 'Administrator'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Narrows an arbitrary string to a known role.
 */
export const isRole = (value: string): value is Role => ROLES.some((role) => role === value);

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Id of the administrator account seeded when the store is first created */
export const SEED_ADMIN_ID = 1;

/** Username of the seeded administrator */
export const SEED_ADMIN_USERNAME = 'admin';

/** Domain used for the email of users who register without one */
export const DEFAULT_EMAIL_DOMAIN = 'minerals.local';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A stored account.
 */
export interface User {
  /** Unique, monotonically assigned, never reused while the store lives */
  readonly id: number;
  readonly username: string;
  /** Opaque digest produced by a PasswordHasher */
  readonly passwordHash: string;
  readonly role: Role;
  readonly email: string;
  /** ISO-8601 creation timestamp */
  readonly createdAt: string;
}

/**
 * Account as shown to administrators (no password digest).
 */
export type PublicUser = Omit<User, 'passwordHash'>;

/**
 * Whole content of the user store.
 */
export interface UserStoreSnapshot {
  readonly users: readonly User[];
  /** Id the next created user receives */
  readonly nextId: number;
}

/**
 * Input for creating an account. Uniqueness of `username` is the caller's concern.
 */
export interface CreateUserInput {
  readonly username: string;
  readonly password: string;
  readonly role: Role;
  /** Blank or absent means `<username>@minerals.local` */
  readonly email?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const defaultEmailFor = (username: string): string =>
  `${username}@${DEFAULT_EMAIL_DOMAIN}`;

/**
 * Email stored for a new account.
 */
export const resolveEmail = (username: string, email: string | undefined): string =>
  email === undefined || email === '' ? defaultEmailFor(username) : email;

export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  username: user.username,
  role: user.role,
  email: user.email,
  createdAt: user.createdAt,
});
