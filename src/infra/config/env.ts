/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Administrator registration secret used when ACM_ADMIN_SECRET is unset */
export const DEFAULT_ADMIN_SECRET = 'letmein';

/** Password given to the seeded `admin` account when the user store is first created */
export const DEFAULT_SEED_ADMIN_PASSWORD = 'password';

/** Default session lifetime: 8 hours */
export const DEFAULT_SESSION_TTL_MS = 8 * 60 * 60 * 1000;

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Storage
  DATA_DIR: Type.String({ minLength: 1, default: './data' }),
  USER_STORE_DRIVER: Type.Union([Type.Literal('json'), Type.Literal('sqlite')], {
    default: 'json',
  }),
  SQLITE_PATH: Type.Optional(Type.String({ minLength: 1 })),

  // Access control
  ACM_ADMIN_SECRET: Type.String({ minLength: 1 }),
  SEED_ADMIN_PASSWORD: Type.String({ minLength: 1 }),
  SESSION_TTL_MS: Type.Number({ minimum: 1000 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

const nonEmpty = (value: string | undefined): string | undefined =>
  value != null && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const sqlitePath = nonEmpty(env['SQLITE_PATH']);
  const allowedOrigins = nonEmpty(env['ALLOWED_ORIGINS']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseNumber(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_DIR: nonEmpty(env['DATA_DIR']) ?? './data',
    USER_STORE_DRIVER: nonEmpty(env['USER_STORE_DRIVER']) ?? 'json',
    ...(sqlitePath !== undefined && { SQLITE_PATH: sqlitePath }),
    ACM_ADMIN_SECRET: nonEmpty(env['ACM_ADMIN_SECRET']) ?? DEFAULT_ADMIN_SECRET,
    SEED_ADMIN_PASSWORD: nonEmpty(env['SEED_ADMIN_PASSWORD']) ?? DEFAULT_SEED_ADMIN_PASSWORD,
    SESSION_TTL_MS: parseNumber(env['SESSION_TTL_MS'], DEFAULT_SESSION_TTL_MS),
    ...(allowedOrigins !== undefined && { ALLOWED_ORIGINS: allowedOrigins }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  data: {
    /** Directory holding the four source CSV files and users.json */
    dir: path.resolve(env.DATA_DIR),
  },
  userStore: {
    driver: env.USER_STORE_DRIVER,
    sqlitePath: path.resolve(env.SQLITE_PATH ?? path.join(env.DATA_DIR, 'users.db')),
  },
  auth: {
    adminSecret: env.ACM_ADMIN_SECRET,
    /** True while the registration secret is still the well-known default */
    usesDefaultAdminSecret: env.ACM_ADMIN_SECRET === DEFAULT_ADMIN_SECRET,
    seedAdminPassword: env.SEED_ADMIN_PASSWORD,
    sessionTtlMs: env.SESSION_TTL_MS,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
