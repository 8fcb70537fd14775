/**
 * fibermeta - Catalog Service
 *
 * HTTP surface over a bootstrapped CatalogStore. The process entry lives in
 * main.ts; this module only assembles the app so it can be exercised
 * in-process.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { CatalogStore, Logger } from '@fibermeta/core';
import { catalogErrorResponse, createCatalogRoutes } from './routes.js';

export { createCatalogRoutes, catalogErrorResponse } from './routes.js';
export { loadConfig, ConfigError, type ServiceConfig } from './config.js';
export { openServiceStore } from './store.js';

/** Service version reported by the root endpoint */
export const SERVICE_VERSION = '0.1.0';

/**
 * Create the Hono app for a store.
 */
export function createApp(store: CatalogStore, logger: Logger): Hono {
  const app = new Hono();

  // Enable CORS for all routes
  app.use('/*', cors());

  // Request logging
  app.use('/*', async (c, next) => {
    const started = Date.now();
    await next();
    logger.debug(
      { method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - started },
      'request'
    );
  });

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({ status: 'healthy', service: 'fibermeta' });
  });

  // Mount catalog routes at /v1
  app.route('/v1', createCatalogRoutes(store));

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      service: 'fibermeta',
      description: 'Catalog for fiber-partitioned tables',
      version: SERVICE_VERSION,
      endpoints: {
        health: '/health',
        databases: '/v1/databases',
        tables: '/v1/tables',
      },
    });
  });

  app.notFound((c) => {
    return c.json(
      { error: { message: `Route not found: ${c.req.method} ${c.req.path}`, type: 'NOT_FOUND', code: 404 } },
      404
    );
  });

  app.onError((error, c) => catalogErrorResponse(c, error, logger));

  return app;
}
