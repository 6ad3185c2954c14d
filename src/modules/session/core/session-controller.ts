/**
 * Session Controller
 *
 * State machine for one interactive session: LoggedOut ⇄ LoggedIn. Owns the
 * role checks in front of the privileged operations; the stores below it
 * do not check roles.
 */

import { err, ok, type Result } from 'neverthrow';

import { SEED_ADMIN_ID, type PublicUser } from '../../users/core/types.js';
import {
  createNotAuthenticatedError,
  createPageNotReachableError,
  createProtectedAccountError,
  type AdminOperationError,
  type LoginError,
  type NotAuthenticatedError,
  type PageAccessError,
  type RegisterError,
  type ReplaceSourceOperationError,
} from './errors.js';
import {
  isLoggedIn,
  LOGGED_OUT,
  pagesFor,
  resolvePage,
  type DashboardPage,
  type LoggedIn,
  type Page,
  type RegisterInput,
  type SessionState,
} from './types.js';
import { loginUser } from './usecases/login-user.js';
import { registerUser } from './usecases/register-user.js';
import { requireAdmin } from './usecases/require-admin.js';

import type { MineralDataRepository } from '../../mineral-data/core/ports.js';
import type { DataSnapshot } from '../../mineral-data/core/types.js';
import type { UserStore } from '../../users/core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionControllerDeps {
  userStore: UserStore;
  dataRepository: MineralDataRepository;
  adminSecret: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Controller
// ─────────────────────────────────────────────────────────────────────────────

export class SessionController {
  private readonly deps: SessionControllerDeps;
  private current: SessionState = LOGGED_OUT;

  constructor(deps: SessionControllerDeps) {
    this.deps = deps;
  }

  get state(): SessionState {
    return this.current;
  }

  /** Pages open to the session, in menu order */
  get pages(): readonly Page[] {
    return pagesFor(this.current);
  }

  /**
   * Logs in by username or email. A failed attempt leaves the state as it was.
   */
  async login(identifier: string, password: string): Promise<Result<LoggedIn, LoginError>> {
    const result = await loginUser(this.deps, identifier, password);
    if (result.isErr()) {
      return err(result.error);
    }

    const user = result.value;
    const state: LoggedIn = {
      status: 'logged-in',
      userId: user.id,
      username: user.username,
      role: user.role,
    };
    this.current = state;
    return ok(state);
  }

  /**
   * Creates an account. The session state does not change.
   */
  register(input: RegisterInput): Promise<Result<PublicUser, RegisterError>> {
    return registerUser(this.deps, input);
  }

  logout(): void {
    this.current = LOGGED_OUT;
  }

  requireLogin(): Result<LoggedIn, NotAuthenticatedError> {
    return isLoggedIn(this.current) ? ok(this.current) : err(createNotAuthenticatedError());
  }

  /**
   * Dashboard to render for a requested page, with `Home` resolved for the
   * current role.
   */
  openPage(page: Page): Result<DashboardPage, PageAccessError> {
    const login = this.requireLogin();
    if (login.isErr()) {
      return err(login.error);
    }

    const target = resolvePage(login.value.role, page);
    return target === null ? err(createPageNotReachableError(page)) : ok(target);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Administrator Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Replaces a source file and returns the snapshot reloaded from disk.
   */
  async replaceSource(
    filename: string,
    bytes: Uint8Array
  ): Promise<Result<DataSnapshot, ReplaceSourceOperationError>> {
    const access = requireAdmin(this.current, 'replace source files');
    if (access.isErr()) {
      return err(access.error);
    }

    const replaced = await this.deps.dataRepository.replaceSource(filename, bytes);
    if (replaced.isErr()) {
      return err(replaced.error);
    }

    return ok(await this.deps.dataRepository.reload());
  }

  /**
   * Deletes an account.
   *
   * @returns whether an account was removed; an unknown id removes nothing
   */
  async deleteUser(id: number): Promise<Result<boolean, AdminOperationError>> {
    const access = requireAdmin(this.current, 'delete users');
    if (access.isErr()) {
      return err(access.error);
    }

    if (id === SEED_ADMIN_ID) {
      return err(createProtectedAccountError(id, 'it is the seed administrator'));
    }
    if (id === access.value.userId) {
      return err(createProtectedAccountError(id, 'it is the account in use'));
    }

    const deleted = await this.deps.userStore.deleteUser(id);
    if (deleted.isErr()) {
      return err(deleted.error);
    }
    return ok(deleted.value);
  }

  async listUsers(): Promise<Result<PublicUser[], AdminOperationError>> {
    const access = requireAdmin(this.current, 'list users');
    if (access.isErr()) {
      return err(access.error);
    }

    const listed = await this.deps.userStore.listUsers();
    if (listed.isErr()) {
      return err(listed.error);
    }
    return ok(listed.value);
  }
}

/**
 * Creates a logged-out controller.
 */
export const makeSessionController = (deps: SessionControllerDeps): SessionController => {
  return new SessionController(deps);
};
