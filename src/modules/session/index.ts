/**
 * Session Module - Public API
 *
 * Login state, role-based page access and the administrator operations.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  AUTH_HEADER,
  BEARER_PREFIX,
  PAGES,
  ROLE_PAGES,
  FALLBACK_PAGES,
  LOGGED_OUT,
  isPage,
  isLoggedIn,
  reachablePages,
  reachablePagesForRole,
  resolveHomePage,
  resolvePage,
  pagesFor,
  type Page,
  type DashboardPage,
  type LoggedIn,
  type LoggedOut,
  type SessionState,
  type RegisterInput,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createInvalidCredentialsError,
  createInvalidAdminCodeError,
  createPasswordMismatchError,
  createMissingFieldsError,
  createDuplicateUsernameError,
  createDuplicateEmailError,
  createNotAuthenticatedError,
  createForbiddenError,
  createPageNotReachableError,
  createProtectedAccountError,
  SESSION_ERROR_HTTP_STATUS,
  getHttpStatusForError,
  type InvalidCredentialsError,
  type InvalidAdminCodeError,
  type PasswordMismatchError,
  type MissingFieldsError,
  type DuplicateUsernameError,
  type DuplicateEmailError,
  type NotAuthenticatedError,
  type ForbiddenError,
  type PageNotReachableError,
  type ProtectedAccountError,
  type LoginError,
  type RegisterError,
  type AccessError,
  type PageAccessError,
  type AdminOperationError,
  type ReplaceSourceOperationError,
  type SessionError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Controller & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { SessionExtractor } from './core/ports.js';

export {
  SessionController,
  makeSessionController,
  type SessionControllerDeps,
} from './core/session-controller.js';

export { registerUser, type RegisterUserDeps } from './core/usecases/register-user.js';
export { loginUser, type LoginUserDeps } from './core/usecases/login-user.js';
export { requireAdmin } from './core/usecases/require-admin.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { httpSessionExtractor } from './shell/extractors/http-extractor.js';

export {
  SessionRegistry,
  makeSessionRegistry,
  generateSessionToken,
  SESSION_TOKEN_BYTES,
  DEFAULT_MAX_SESSIONS,
  type SessionRegistryOptions,
} from './shell/registry/session-registry.js';

export {
  makeSessionMiddleware,
  type MakeSessionMiddlewareDeps,
  type RequestSession,
} from './shell/middleware/fastify-session.js';

export {
  makeSessionRoutes,
  sendSessionError,
  type MakeSessionRoutesDeps,
} from './shell/rest/routes.js';

export {
  makeAdminRoutes,
  type MakeAdminRoutesDeps,
  MAX_SOURCE_UPLOAD_BYTES,
  SOURCE_UPLOAD_CONTENT_TYPES,
} from './shell/rest/admin-routes.js';
