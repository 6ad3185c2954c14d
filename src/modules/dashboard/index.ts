/**
 * Dashboard Module - Public API
 *
 * Charts, metrics and page models for the investor, researcher and
 * administrator dashboards.
 */

export {
  INVESTOR_TOP_LIMIT,
  FULL_DASHBOARD_TOP_LIMIT,
  DEFAULT_COMPARISON_SIZE,
  type ProductionTotal,
  type HeadlineMetrics,
  type CountryProfile,
  type CountryComparison,
  type SourceSummary,
  type PageQuery,
  type InvestorDashboard,
  type FullDashboard,
  type ResearcherDashboard,
  type AdminDashboard,
  type PageModel,
} from './core/types.js';

export {
  topMinerals,
  topCountries,
  headlineMetrics,
  countryNames,
  mineralOptions,
  miningShareOfGdp,
  countryProfile,
  compareCountries,
} from './core/aggregations.js';

export { buildInvestorDashboard, buildFullDashboard, summarizeSources } from './core/page-models.js';

export type { PageViewer } from './core/ports.js';

export { getPage, type GetPageDeps, type GetPageError } from './core/usecases/get-page.js';

export {
  makeDashboardRoutes,
  parseCompareList,
  type MakeDashboardRoutesDeps,
} from './shell/rest/routes.js';

export {
  InvestorDashboardSchema,
  ResearcherDashboardSchema,
  AdminDashboardSchema,
  PageModelSchema,
  PageResponseSchema,
} from './shell/rest/schemas.js';
