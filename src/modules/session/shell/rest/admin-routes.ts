/**
 * Session Module Administrator Routes
 *
 * - PUT /api/v1/admin/sources/:filename: Replace a source CSV
 * - GET /api/v1/admin/users: List accounts
 * - DELETE /api/v1/admin/users/:id: Delete an account
 */

import { ErrorResponseSchema } from '../../../../common/schemas/base.js';
import { resolveSourceName } from '../../../mineral-data/core/types.js';
import {
  DeleteUserResponseSchema,
  ReplaceSourceResponseSchema,
  SourceFileParamsSchema,
  UserIdParamsSchema,
  UserListResponseSchema,
  type SourceFileParams,
  type UserIdParams,
} from './schemas.js';
import { sendSessionError } from './routes.js';

import type { SessionRegistry } from '../registry/session-registry.js';
import type { FastifyPluginAsync } from 'fastify';

/** Largest accepted source upload */
export const MAX_SOURCE_UPLOAD_BYTES = 10 * 1024 * 1024;

/** Content types accepted for source uploads */
export const SOURCE_UPLOAD_CONTENT_TYPES = ['text/csv', 'application/octet-stream'];

const adminErrorResponses = {
  400: ErrorResponseSchema,
  401: ErrorResponseSchema,
  403: ErrorResponseSchema,
  409: ErrorResponseSchema,
  415: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

export interface MakeAdminRoutesDeps {
  /** Sessions of deleted accounts are ended here */
  registry: Pick<SessionRegistry, 'revokeUser'>;
}

export const makeAdminRoutes = (deps: MakeAdminRoutesDeps): FastifyPluginAsync => {
  const { registry } = deps;

  return async (fastify) => {
    // Uploads arrive as raw bytes and are stored unchanged
    fastify.addContentTypeParser(
      SOURCE_UPLOAD_CONTENT_TYPES,
      { parseAs: 'buffer', bodyLimit: MAX_SOURCE_UPLOAD_BYTES },
      (_request, body, done) => {
        done(null, body);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/admin/sources/:filename
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: SourceFileParams; Body: unknown }>(
      '/api/v1/admin/sources/:filename',
      {
        bodyLimit: MAX_SOURCE_UPLOAD_BYTES,
        schema: {
          params: SourceFileParamsSchema,
          response: { 200: ReplaceSourceResponseSchema, ...adminErrorResponses },
        },
      },
      async (request, reply) => {
        const body = request.body;
        if (!(body instanceof Uint8Array)) {
          return reply.status(415).send({
            ok: false,
            error: 'UnsupportedMediaType',
            message: `Send the file as ${SOURCE_UPLOAD_CONTENT_TYPES.join(' or ')}`,
          });
        }

        const { filename } = request.params;
        const result = await request.session.controller.replaceSource(filename, body);
        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        const snapshot = result.value;
        const source = resolveSourceName(filename);
        const rowCount = source === null ? 0 : snapshot.tables[source].rows.length;

        request.log.info({ filename, rowCount }, 'Source replaced by administrator');
        return reply.status(200).send({
          ok: true,
          data: { file: filename, rowCount, loadedAt: snapshot.loadedAt },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/admin/users
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/admin/users',
      { schema: { response: { 200: UserListResponseSchema, ...adminErrorResponses } } },
      async (request, reply) => {
        const result = await request.session.controller.listUsers();
        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { users: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/admin/users/:id
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: UserIdParams }>(
      '/api/v1/admin/users/:id',
      {
        schema: {
          params: UserIdParamsSchema,
          response: { 200: DeleteUserResponseSchema, ...adminErrorResponses },
        },
      },
      async (request, reply) => {
        const { id } = request.params;
        const result = await request.session.controller.deleteUser(id);
        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        if (result.value) {
          const revoked = registry.revokeUser(id);
          request.log.info({ userId: id, revoked }, 'Account deleted by administrator');
        }
        return reply.status(200).send({ ok: true, data: { deleted: result.value } });
      }
    );
  };
};
