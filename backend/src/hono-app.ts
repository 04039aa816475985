import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { compress } from 'hono/compress';
import { HTTPException } from 'hono/http-exception';

import logger from './lib/logger';
import type { ConfigService } from './services/config';
import type { NodeSnapshotProvider } from './services/snapshots';
import { createHealthRoutes } from './routes/health';
import { createNodesRoutes } from './routes/nodes';
import { createAnalysisRoutes } from './routes/analysis';
import { createSettingsRoutes } from './routes/settings';

/**
 * Collaborators the routes read from
 */
export interface AppDeps {
  snapshots: NodeSnapshotProvider;
  config: ConfigService;
}

export interface AppOptions {
  corsOrigin?: string;
}

export function createApp(deps: AppDeps, options: AppOptions = {}) {
  const health = createHealthRoutes(deps);

  const app = new Hono();

  // ============================================================================
  // Middleware
  // ============================================================================

  app.use('*', compress());
  app.use('*', cors({ origin: options.corsOrigin ?? '*' }));

  app.use('*', async (c, next) => {
    logger.info({ method: c.req.method, url: c.req.url }, `${c.req.method} ${c.req.path}`);
    await next();
  });

  // ============================================================================
  // API Routes
  // ============================================================================

  const routes = app
    .route('/api/health', health)
    .route('/api/cluster', health)
    .route('/api/nodes', createNodesRoutes(deps))
    .route('/api/analysis', createAnalysisRoutes(deps))
    .route('/api/settings', createSettingsRoutes(deps));

  app.notFound((c) => {
    logger.warn(
      { method: c.req.method, url: c.req.url, statusCode: 404 },
      `No route matched: ${c.req.method} ${c.req.url}`
    );
    return c.json(
      { error: { message: `Route not found: ${c.req.method} ${c.req.path}`, statusCode: 404 } },
      404
    );
  });

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      if (err.status >= 500) {
        logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);
      } else {
        logger.warn({ statusCode: err.status, path: c.req.path }, err.message);
      }
      return c.json(
        {
          error: {
            message: err.message,
            statusCode: err.status,
          },
        },
        err.status
      );
    }

    logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);
    return c.json(
      {
        error: {
          message: err.message || 'Internal Server Error',
          statusCode: 500,
        },
      },
      500
    );
  });

  return routes;
}

// Export for RPC type inference
export type AppType = ReturnType<typeof createApp>;
