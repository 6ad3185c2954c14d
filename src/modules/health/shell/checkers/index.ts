export {
  makeTimedCheck,
  DEFAULT_CHECK_TIMEOUT_MS,
  type TimedCheckOptions,
} from './timed-check.js';
export {
  makeDataDirHealthChecker,
  type DataDirHealthCheckerOptions,
} from './data-dir-checker.js';
export {
  makeUserStoreHealthChecker,
  type UserStoreHealthCheckerOptions,
} from './user-store-checker.js';
export {
  makeSourceTablesHealthChecker,
  type SourceTablesHealthCheckerOptions,
} from './source-tables-checker.js';
