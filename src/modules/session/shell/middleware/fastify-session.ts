/**
 * Fastify Session Middleware
 *
 * Attaches the caller's session controller to every request.
 */

import { httpSessionExtractor } from '../extractors/http-extractor.js';

import type { SessionController } from '../../core/session-controller.js';
import type { SessionRegistry } from '../registry/session-registry.js';
import type { FastifyReply, FastifyRequest, preHandlerHookHandler } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Request Decoration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session of the current request. `token` is null for requests without a
 * live session; their controller is logged out and not registered.
 */
export interface RequestSession {
  token: string | null;
  controller: SessionController;
}

declare module 'fastify' {
  interface FastifyRequest {
    /** Session context (set by session middleware) */
    session: RequestSession;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Middleware
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeSessionMiddlewareDeps {
  registry: SessionRegistry;
  /** Creates the logged-out controller used for anonymous requests */
  createController: () => SessionController;
}

/**
 * Resolves the bearer token to a registered session. Unknown or expired
 * tokens are treated as no token; routes decide whether a login is required.
 *
 * @example
 * app.addHook('preHandler', makeSessionMiddleware({ registry, createController }));
 */
export function makeSessionMiddleware(deps: MakeSessionMiddlewareDeps): preHandlerHookHandler {
  const handler = async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    const token = httpSessionExtractor.extractToken(request);
    const controller = token === null ? undefined : deps.registry.get(token);

    request.session =
      token !== null && controller !== undefined
        ? { token, controller }
        : { token: null, controller: deps.createController() };
  };

  // Type assertion needed for async preHandler hooks with strictFunctionTypes
  return handler as preHandlerHookHandler;
}
