/**
 * Health REST Routes
 *
 * - GET /health/live: 200 while the process runs; dependencies are not checked
 * - GET /health/ready: readiness report; 503 when a critical check fails
 */

import {
  LivenessResponseSchema,
  READINESS_HTTP_STATUS,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { Clock, HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  checkers?: readonly HealthChecker[];
  version?: string | undefined;
  now?: Clock;
}

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const now = deps.now ?? (() => new Date());
  const readinessDeps: GetReadinessDeps = {
    checkers: deps.checkers ?? [],
    version: deps.version,
    startedAt: now().getTime(),
    now,
  };

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => reply.status(200).send({ status: 'ok' })
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (request, reply) => {
        const report = await getReadiness(readinessDeps);

        if (report.status !== 'ok') {
          request.log.warn(
            { failing: report.checks.filter((check) => check.status === 'unhealthy') },
            'Readiness check reported problems'
          );
        }

        return reply.status(READINESS_HTTP_STATUS[report.status]).send(report);
      }
    );
  };
};
