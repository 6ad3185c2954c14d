/**
 * Integration tests for CORS and security headers
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestAppDeps } from '../fixtures/fakes.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { FastifyInstance } from 'fastify';

const DEVELOPMENT: AppConfig['server'] = {
  isDevelopment: true,
  isProduction: false,
  isTest: true,
  port: 3000,
  host: '0.0.0.0',
};

const PRODUCTION: AppConfig['server'] = {
  isDevelopment: false,
  isProduction: true,
  isTest: false,
  port: 3000,
  host: '0.0.0.0',
};

describe('CORS Plugin', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  const start = async (
    server: AppConfig['server'],
    allowedOrigins?: string
  ): Promise<FastifyInstance> => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({ config: { server, cors: { allowedOrigins } } }),
    });
    return app;
  };

  describe('Development Mode', () => {
    it('allows localhost origins', async () => {
      const server = await start(DEVELOPMENT);

      const response = await server.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });

    it('rejects other origins', async () => {
      const server = await start(DEVELOPMENT);

      const response = await server.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://random.example.com' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json().error).toBe('InternalServerError');
    });
  });

  describe('Production Mode - ALLOWED_ORIGINS', () => {
    it('allows each listed origin', async () => {
      const server = await start(PRODUCTION, 'https://app1.com, https://app2.com');

      const first = await server.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://app1.com' },
      });
      expect(first.statusCode).toBe(200);
      expect(first.headers['access-control-allow-origin']).toBe('https://app1.com');

      const second = await server.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://app2.com' },
      });
      expect(second.statusCode).toBe(200);
      expect(second.headers['access-control-allow-origin']).toBe('https://app2.com');
    });

    it('does not accept localhost outside development', async () => {
      const server = await start(PRODUCTION, 'https://app1.com');

      const response = await server.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(response.statusCode).toBe(500);
    });

    it('answers preflight for source uploads', async () => {
      const server = await start(PRODUCTION, 'https://app1.com');

      const response = await server.inject({
        method: 'OPTIONS',
        url: '/api/v1/admin/sources/minerals.csv',
        headers: {
          origin: 'https://app1.com',
          'access-control-request-method': 'PUT',
        },
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers['access-control-allow-methods']).toContain('PUT');
    });
  });

  describe('Server-to-Server Requests', () => {
    it('allows requests without origin header in production', async () => {
      const server = await start(PRODUCTION, 'https://app1.com');

      const response = await server.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('Security headers', () => {
    it('sets helmet headers outside the test environment', async () => {
      const server = await start(PRODUCTION);

      const response = await server.inject({ method: 'GET', url: '/health/live' });

      expect(response.headers['x-frame-options']).toBe('DENY');
      expect(response.headers['referrer-policy']).toBe('no-referrer');
    });

    it('skips them in the test environment', async () => {
      const server = await start(DEVELOPMENT);

      const response = await server.inject({ method: 'GET', url: '/health/live' });

      expect(response.headers['x-frame-options']).toBeUndefined();
    });
  });
});
