/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';

// Health checker factories
export {
  makeTimedCheck,
  makeDataDirHealthChecker,
  makeUserStoreHealthChecker,
  makeSourceTablesHealthChecker,
  DEFAULT_CHECK_TIMEOUT_MS,
  type TimedCheckOptions,
  type DataDirHealthCheckerOptions,
  type UserStoreHealthCheckerOptions,
  type SourceTablesHealthCheckerOptions,
} from './shell/checkers/index.js';

// Core
export { mapCheckResults, determineOverallStatus, evaluateReadiness } from './core/logic.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

// Types
export type { Clock, HealthChecker } from './core/ports.js';
export { READINESS_HTTP_STATUS } from './core/types.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
