/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeDashboardRoutes } from '../modules/dashboard/index.js';
import {
  makeDataDirHealthChecker,
  makeHealthRoutes,
  makeSourceTablesHealthChecker,
  makeUserStoreHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import { makeSiteMapRoutes } from '../modules/site-map/index.js';
import {
  makeAdminRoutes,
  makeSessionController,
  makeSessionMiddleware,
  makeSessionRegistry,
  makeSessionRoutes,
  type SessionController,
  type SessionRegistry,
} from '../modules/session/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { MineralDataRepository } from '../modules/mineral-data/index.js';
import type { UserStore } from '../modules/users/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  userStore: UserStore;
  dataRepository: MineralDataRepository;
  /** Defaults to an in-process registry with the configured session TTL */
  sessionRegistry?: SessionRegistry;
  /** Defaults to the data directory, user store and source table checks */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (
    deps.config === undefined ||
    deps.userStore === undefined ||
    deps.dataRepository === undefined
  ) {
    throw new Error('Missing required dependencies: config, userStore, dataRepository');
  }

  const { config, userStore, dataRepository } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [
        makeDataDirHealthChecker(dataRepository),
        makeUserStoreHealthChecker(userStore),
        makeSourceTablesHealthChecker(dataRepository),
      ],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Sessions
  // ─────────────────────────────────────────────────────────────────────────────
  const registry =
    deps.sessionRegistry ?? makeSessionRegistry({ ttlMs: config.auth.sessionTtlMs });
  const createController = (): SessionController =>
    makeSessionController({
      userStore,
      dataRepository,
      adminSecret: config.auth.adminSecret,
    });

  app.addHook('preHandler', makeSessionMiddleware({ registry, createController }));

  await app.register(makeSessionRoutes({ registry, createController }));
  await app.register(makeAdminRoutes({ registry }));

  // ─────────────────────────────────────────────────────────────────────────────
  // Dashboards
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(makeDashboardRoutes({ dataRepository }));
  await app.register(makeSiteMapRoutes({ dataRepository }));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.debug({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      request.log.debug({ err: error }, 'Request rejected');
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.code,
        message: error.message,
      });
    }

    // Handle unexpected errors
    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
