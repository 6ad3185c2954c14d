/**
 * Dashboard REST Routes
 *
 * - GET /api/v1/pages/:page: Page model for a page the session may open
 */

import { ErrorResponseSchema } from '../../../../common/schemas/base.js';
import { sendSessionError } from '../../../session/shell/rest/routes.js';
import { getPage } from '../../core/usecases/get-page.js';
import {
  PageParamsSchema,
  PageQuerySchema,
  PageResponseSchema,
  type PageParams,
  type PageQueryString,
} from './schemas.js';

import type { MineralDataRepository } from '../../../mineral-data/core/ports.js';
import type { PageQuery } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeDashboardRoutesDeps {
  dataRepository: MineralDataRepository;
}

/**
 * Splits `?compare=a,b` into names; blank entries are dropped.
 */
export const parseCompareList = (raw: string): string[] =>
  raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');

const toPageQuery = (query: PageQueryString): PageQuery => ({
  ...(query.mineral !== undefined && { mineral: query.mineral }),
  ...(query.country !== undefined && { country: query.country }),
  ...(query.compare !== undefined && { compare: parseCompareList(query.compare) }),
});

export const makeDashboardRoutes = (deps: MakeDashboardRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get<{ Params: PageParams; Querystring: PageQueryString }>(
      '/api/v1/pages/:page',
      {
        schema: {
          params: PageParamsSchema,
          querystring: PageQuerySchema,
          response: {
            200: PageResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getPage(
          deps,
          request.session.controller,
          request.params.page,
          toPageQuery(request.query)
        );

        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
