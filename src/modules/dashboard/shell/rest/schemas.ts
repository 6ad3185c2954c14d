/**
 * Dashboard REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { OkResponseSchema } from '../../../../common/schemas/base.js';
import { PageSchema, PublicUserSchema } from '../../../session/shell/rest/schemas.js';
import { NullableMapModelSchema } from '../../../site-map/shell/rest/schemas.js';

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);
const NullableString = Type.Union([Type.String(), Type.Null()]);

export const PageParamsSchema = Type.Object({
  page: PageSchema,
});

export type PageParams = Static<typeof PageParamsSchema>;

export const PageQuerySchema = Type.Object({
  mineral: Type.Optional(Type.String({ minLength: 1, maxLength: 200 })),
  country: Type.Optional(Type.String({ minLength: 1, maxLength: 200 })),
  compare: Type.Optional(
    Type.String({ maxLength: 2000, description: 'Comma-separated country names' })
  ),
});

export type PageQueryString = Static<typeof PageQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Page Models
// ─────────────────────────────────────────────────────────────────────────────

const ProductionTotalSchema = Type.Object({
  name: Type.String(),
  productionTonnes: Type.Number(),
});

const HeadlineMetricsSchema = Type.Object({
  totalMiningRevenueBillionUsd: Type.Number(),
  totalGdpBillionUsd: Type.Number(),
});

/** One production row joined with its country and mineral */
export const JoinedProductionSchema = Type.Object({
  countryId: Type.Number(),
  countryName: Type.String(),
  gdpBillionUsd: NullableNumber,
  miningRevenueBillionUsd: NullableNumber,
  keyProjects: NullableString,
  mineralId: Type.Number(),
  mineralName: Type.String(),
  description: NullableString,
  productionTonnes: NullableNumber,
  exportValueBillionUsd: NullableNumber,
});

const CountryProfileSchema = Type.Object({
  countryName: Type.String(),
  gdpBillionUsd: NullableNumber,
  miningRevenueBillionUsd: NullableNumber,
  miningShareOfGdpPercent: NullableNumber,
  keyProjects: NullableString,
  production: Type.Array(JoinedProductionSchema),
});

const TableStatusSchema = Type.Union([
  Type.Object({ kind: Type.Literal('loaded') }),
  Type.Object({ kind: Type.Literal('missing') }),
  Type.Object({ kind: Type.Literal('unreadable'), reason: Type.String() }),
  Type.Object({ kind: Type.Literal('malformed'), reason: Type.String() }),
]);

const SourceSummarySchema = Type.Object({
  source: Type.Union([
    Type.Literal('countries'),
    Type.Literal('minerals'),
    Type.Literal('production'),
    Type.Literal('sites'),
  ]),
  file: Type.String(),
  status: TableStatusSchema,
  rowCount: Type.Integer(),
});

const fullDashboardFields = {
  metrics: Type.Union([HeadlineMetricsSchema, Type.Null()]),
  topMinerals: Type.Array(ProductionTotalSchema),
  mineralOptions: Type.Array(Type.String()),
  mineralFilter: Type.String(),
  map: NullableMapModelSchema,
  countries: Type.Array(Type.String()),
  profile: Type.Union([CountryProfileSchema, Type.Null()]),
  comparison: Type.Object({
    countries: Type.Array(Type.String()),
    rows: Type.Array(JoinedProductionSchema),
  }),
};

export const InvestorDashboardSchema = Type.Object({
  page: Type.Literal('Investor'),
  topMinerals: Type.Array(ProductionTotalSchema),
  topCountries: Type.Array(ProductionTotalSchema),
  mineralOptions: Type.Array(Type.String()),
  mineralFilter: Type.String(),
  map: NullableMapModelSchema,
});

export const ResearcherDashboardSchema = Type.Object({
  page: Type.Literal('Researcher'),
  ...fullDashboardFields,
});

export const AdminDashboardSchema = Type.Object({
  page: Type.Literal('Admin'),
  ...fullDashboardFields,
  users: Type.Array(PublicUserSchema),
  sources: Type.Array(SourceSummarySchema),
});

export const PageModelSchema = Type.Union([
  InvestorDashboardSchema,
  ResearcherDashboardSchema,
  AdminDashboardSchema,
]);

export const PageResponseSchema = OkResponseSchema(PageModelSchema);
