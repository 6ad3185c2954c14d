/**
 * Session Module REST Routes
 *
 * - POST /api/v1/auth/register: Create an account (public)
 * - POST /api/v1/auth/login: Start a session (public)
 * - POST /api/v1/auth/logout: End the session
 * - GET /api/v1/auth/session: Current state and pages
 */

import { ErrorResponseSchema } from '../../../../common/schemas/base.js';
import { getHttpStatusForError, type SessionError } from '../../core/errors.js';
import { isLoggedIn, pagesFor, type LoggedIn } from '../../core/types.js';
import {
  LoginBodySchema,
  LoginResponseSchema,
  LogoutResponseSchema,
  RegisterBodySchema,
  RegisterResponseSchema,
  SessionResponseSchema,
  type LoginBody,
  type RegisterBody,
} from './schemas.js';

import type { SessionController } from '../../core/session-controller.js';
import type { SessionRegistry } from '../registry/session-registry.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeSessionRoutesDeps {
  registry: SessionRegistry;
  createController: () => SessionController;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends a session error with its mapped status. Server-side failures are
 * logged.
 */
export function sendSessionError(request: FastifyRequest, reply: FastifyReply, error: SessionError) {
  const status = getHttpStatusForError(error);
  if (status >= 500) {
    request.log.error({ err: error }, 'Session operation failed');
  }

  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const toSessionUser = (state: LoggedIn) => ({
  id: state.userId,
  username: state.username,
  role: state.role,
});

const sessionErrorResponses = {
  400: ErrorResponseSchema,
  401: ErrorResponseSchema,
  409: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeSessionRoutes = (deps: MakeSessionRoutesDeps): FastifyPluginAsync => {
  const { registry, createController } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/register
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: RegisterBody }>(
      '/api/v1/auth/register',
      {
        schema: {
          body: RegisterBodySchema,
          response: { 201: RegisterResponseSchema, ...sessionErrorResponses },
        },
      },
      async (request, reply) => {
        const { email, adminCode, ...fields } = request.body;
        const result = await request.session.controller.register({
          ...fields,
          ...(email !== undefined && { email }),
          ...(adminCode !== undefined && { adminCode }),
        });

        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        request.log.info(
          { userId: result.value.id, role: result.value.role },
          'Account registered'
        );
        return reply.status(201).send({ ok: true, data: { user: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/login
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: LoginBody }>(
      '/api/v1/auth/login',
      {
        schema: {
          body: LoginBodySchema,
          response: { 200: LoginResponseSchema, ...sessionErrorResponses },
        },
      },
      async (request, reply) => {
        // Every successful login gets a fresh controller and token
        const controller = createController();
        const result = await controller.login(request.body.identifier, request.body.password);

        if (result.isErr()) {
          return sendSessionError(request, reply, result.error);
        }

        if (request.session.token !== null) {
          registry.revoke(request.session.token);
        }
        const token = registry.issue(controller);

        request.log.info({ userId: result.value.userId }, 'Session started');
        return reply.status(200).send({
          ok: true,
          data: { token, user: toSessionUser(result.value), pages: controller.pages },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/auth/logout
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/v1/auth/logout',
      { schema: { response: { 200: LogoutResponseSchema } } },
      async (request, reply) => {
        const { token, controller } = request.session;
        controller.logout();
        if (token !== null) {
          registry.revoke(token);
        }

        return reply.status(200).send({ ok: true, data: { loggedOut: true } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/auth/session
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/auth/session',
      { schema: { response: { 200: SessionResponseSchema } } },
      async (request, reply) => {
        const state = request.session.controller.state;

        return reply.status(200).send({
          ok: true,
          data: {
            authenticated: isLoggedIn(state),
            user: isLoggedIn(state) ? toSessionUser(state) : null,
            pages: pagesFor(state),
          },
        });
      }
    );
  };
};
