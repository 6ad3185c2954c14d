/**
 * Site Map REST Routes
 *
 * - GET /api/v1/map: Map model for the joined sites (requires login)
 */

import { ErrorResponseSchema } from '../../../../common/schemas/base.js';
import { joinedRows } from '../../../mineral-data/core/join.js';
import { sendSessionError } from '../../../session/shell/rest/routes.js';
import { buildMapModel } from '../../core/map-model.js';
import { ALL_MINERALS } from '../../core/types.js';
import { MapQuerySchema, MapResponseSchema, type MapQuery } from './schemas.js';

import type { MineralDataRepository } from '../../../mineral-data/core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeSiteMapRoutesDeps {
  dataRepository: MineralDataRepository;
}

export const makeSiteMapRoutes = (deps: MakeSiteMapRoutesDeps): FastifyPluginAsync => {
  const { dataRepository } = deps;

  return async (fastify) => {
    fastify.get<{ Querystring: MapQuery }>(
      '/api/v1/map',
      {
        schema: {
          querystring: MapQuerySchema,
          response: { 200: MapResponseSchema, 401: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const login = request.session.controller.requireLogin();
        if (login.isErr()) {
          return sendSessionError(request, reply, login.error);
        }

        const snapshot = await dataRepository.load();
        const map = buildMapModel(
          joinedRows(snapshot.views.sites),
          request.query.mineral ?? ALL_MINERALS
        );

        return reply.status(200).send({ ok: true, data: { map } });
      }
    );
  };
};
