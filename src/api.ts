/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import fs from 'node:fs/promises';

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initUserDatabase } from './infra/database/client.js';
import { buildLoggerOptions, createLogger, type Logger } from './infra/logger/index.js';
import { makeCsvMineralDataRepo, makeFsSourceStore } from './modules/mineral-data/index.js';
import {
  makeJsonFileUserStore,
  makeScryptPasswordHasher,
  makeSqliteUserStore,
  type UserStore,
} from './modules/users/index.js';

const LOGGER_NAME = 'critical-minerals-api';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

/**
 * Creates the user store selected by USER_STORE_DRIVER.
 */
const createUserStore = (config: AppConfig, logger: Logger): UserStore => {
  const hasher = makeScryptPasswordHasher();
  const { seedAdminPassword } = config.auth;

  if (config.userStore.driver === 'sqlite') {
    logger.info({ file: config.userStore.sqlitePath }, 'Using SQLite user store');
    return makeSqliteUserStore({
      db: initUserDatabase(config.userStore.sqlitePath),
      hasher,
      seedAdminPassword,
      logger,
    });
  }

  logger.info({ dir: config.data.dir }, 'Using JSON file user store');
  return makeJsonFileUserStore({ dataDir: config.data.dir, hasher, seedAdminPassword, logger });
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = {
    level: config.logger.level,
    name: LOGGER_NAME,
    pretty: config.logger.pretty,
  };
  const logger = createLogger(loggerConfig);

  logger.info({ config: { server: config.server, data: config.data } }, 'Starting API server');

  if (config.auth.usesDefaultAdminSecret) {
    logger.warn('ACM_ADMIN_SECRET is not set; administrator registration uses the default code');
  }

  await fs.mkdir(config.data.dir, { recursive: true });

  // Initialize dependencies
  const userStore = createUserStore(config, logger);
  const initialized = await userStore.initialize();
  if (initialized.isErr()) {
    throw new Error(`User store could not be initialized: ${initialized.error.message}`);
  }

  const dataRepository = makeCsvMineralDataRepo({
    files: makeFsSourceStore({ dataDir: config.data.dir }),
    logger,
  });
  await dataRepository.load();

  const app = await buildApp({
    fastifyOptions: {
      logger: buildLoggerOptions(loggerConfig),
      disableRequestLogging: false,
    },
    deps: {
      config,
      userStore,
      dataRepository,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await userStore.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
