/**
 * Session Module - Domain Types
 *
 * Per-session login state and the role → pages table.
 */

import { isRole, type Role } from '../../users/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * HTTP header carrying the session token.
 */
export const AUTH_HEADER = 'authorization';

/**
 * Bearer token prefix.
 */
export const BEARER_PREFIX = 'Bearer ';

// ─────────────────────────────────────────────────────────────────────────────
// Pages
// ─────────────────────────────────────────────────────────────────────────────

export const PAGES = ['Home', 'Investor', 'Researcher', 'Admin'] as const;

export type Page = (typeof PAGES)[number];

/** Pages with their own dashboard; `Home` resolves to one of these */
export type DashboardPage = Exclude<Page, 'Home'>;

export const isPage = (value: string): value is Page => PAGES.some((page) => page === value);

/**
 * Pages each role may open, in menu order. Investors have no `Home` entry.
 */
export const ROLE_PAGES: Readonly<Record<Role, readonly Page[]>> = {
  Investor: ['Investor'],
  Researcher: ['Researcher', 'Home'],
  Administrator: ['Admin', 'Home'],
};

/** Pages of a role this build does not know */
export const FALLBACK_PAGES: readonly Page[] = ['Home'];

export const reachablePages = (role: Role): readonly Page[] => ROLE_PAGES[role];

/**
 * Pages for a role read from outside the type system, such as a stored
 * string.
 */
export const reachablePagesForRole = (role: string): readonly Page[] =>
  isRole(role) ? ROLE_PAGES[role] : FALLBACK_PAGES;

/**
 * Dashboard shown for `Home`.
 */
export const resolveHomePage = (role: string): DashboardPage => {
  if (role === 'Administrator') {
    return 'Admin';
  }
  if (role === 'Researcher') {
    return 'Researcher';
  }
  return 'Investor';
};

/**
 * Dashboard behind `page` for this role, or null when the role cannot open it.
 */
export const resolvePage = (role: string, page: Page): DashboardPage | null => {
  if (!reachablePagesForRole(role).includes(page)) {
    return null;
  }
  return page === 'Home' ? resolveHomePage(role) : page;
};

// ─────────────────────────────────────────────────────────────────────────────
// Session State
// ─────────────────────────────────────────────────────────────────────────────

export interface LoggedOut {
  readonly status: 'logged-out';
}

export interface LoggedIn {
  readonly status: 'logged-in';
  readonly userId: number;
  readonly username: string;
  readonly role: Role;
}

export type SessionState = LoggedOut | LoggedIn;

export const LOGGED_OUT: LoggedOut = { status: 'logged-out' };

export const isLoggedIn = (state: SessionState): state is LoggedIn => state.status === 'logged-in';

/**
 * Pages open to the session; none while logged out.
 */
export const pagesFor = (state: SessionState): readonly Page[] =>
  isLoggedIn(state) ? reachablePagesForRole(state.role) : [];

// ─────────────────────────────────────────────────────────────────────────────
// Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface RegisterInput {
  readonly username: string;
  readonly password: string;
  readonly confirmPassword: string;
  readonly role: Role;
  /** Blank means `<username>@minerals.local` */
  readonly email?: string;
  /** Required to register an Administrator */
  readonly adminCode?: string;
}
