/**
 * Health Module - Types
 *
 * A failing non-critical check, such as a source CSV that is not loaded,
 * degrades the readiness report without making the service unready.
 */

import { Type, type Static } from '@sinclair/typebox';

export const CheckStatusSchema = Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]);

export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Checked dependency, e.g. user-store' }),
  status: CheckStatusSchema,
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
  critical: Type.Optional(
    Type.Boolean({ description: 'Failure makes the service unready; true when absent' })
  ),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

/** HTTP status sent with each readiness status */
export const READINESS_HTTP_STATUS: Record<ReadinessStatus, number> = {
  ok: 200,
  degraded: 200,
  unhealthy: 503,
};

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Integer({ minimum: 0, description: 'Seconds since the routes were registered' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
