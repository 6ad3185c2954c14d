/**
 * Unit tests for configuration module
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { parseEnv, createConfig, DEFAULT_ADMIN_SECRET } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv };
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ PORT: '8080' });

      expect(env.PORT).toBe(8080);
      expect(typeof env.PORT).toBe('number');
    });

    it('accepts valid NODE_ENV values', () => {
      expect(parseEnv({ NODE_ENV: 'development' }).NODE_ENV).toBe('development');
      expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
      expect(parseEnv({ NODE_ENV: 'test' }).NODE_ENV).toBe('test');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('defaults storage and access control settings', () => {
      const env = parseEnv({});

      expect(env.DATA_DIR).toBe('./data');
      expect(env.USER_STORE_DRIVER).toBe('json');
      expect(env.SQLITE_PATH).toBeUndefined();
      expect(env.ACM_ADMIN_SECRET).toBe(DEFAULT_ADMIN_SECRET);
      expect(env.SEED_ADMIN_PASSWORD).toBe('password');
      expect(env.SESSION_TTL_MS).toBe(8 * 60 * 60 * 1000);
    });

    it('treats empty strings as unset', () => {
      const env = parseEnv({ ACM_ADMIN_SECRET: '', DATA_DIR: '', ALLOWED_ORIGINS: '' });

      expect(env.ACM_ADMIN_SECRET).toBe(DEFAULT_ADMIN_SECRET);
      expect(env.DATA_DIR).toBe('./data');
      expect(env.ALLOWED_ORIGINS).toBeUndefined();
    });

    it('rejects an unknown user store driver', () => {
      expect(() => parseEnv({ USER_STORE_DRIVER: 'postgres' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('rejects a session TTL under one second', () => {
      expect(() => parseEnv({ SESSION_TTL_MS: '500' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isDevelopment).toBe(false);
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.server.isTest).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.server.isDevelopment).toBe(false);
      expect(testConfig.server.isProduction).toBe(false);
      expect(testConfig.server.isTest).toBe(true);
    });

    it('sets pretty logging for non-production', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.logger.pretty).toBe(true);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.logger.pretty).toBe(false);
    });

    it('passes through port and host', () => {
      const config = createConfig(parseEnv({ PORT: '8080', HOST: '127.0.0.1' }));

      expect(config.server.port).toBe(8080);
      expect(config.server.host).toBe('127.0.0.1');
    });

    it('resolves the data directory and defaults the SQLite file inside it', () => {
      const config = createConfig(parseEnv({ DATA_DIR: '/srv/minerals' }));

      expect(config.data.dir).toBe('/srv/minerals');
      expect(config.userStore.sqlitePath).toBe('/srv/minerals/users.db');
    });

    it('flags the default admin secret', () => {
      expect(createConfig(parseEnv({})).auth.usesDefaultAdminSecret).toBe(true);

      const config = createConfig(parseEnv({ ACM_ADMIN_SECRET: 'test-secret' }));
      expect(config.auth.usesDefaultAdminSecret).toBe(false);
      expect(config.auth.adminSecret).toBe('test-secret');
    });
  });
});
