export {
  EnvSchema,
  parseEnv,
  createConfig,
  DEFAULT_ADMIN_SECRET,
  DEFAULT_SEED_ADMIN_PASSWORD,
  DEFAULT_SESSION_TTL_MS,
  type Env,
  type AppConfig,
} from './env.js';
