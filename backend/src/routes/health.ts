import { Hono } from 'hono';
import type { AppDeps } from '../hono-app';

/**
 * Liveness and snapshot-source status, mounted at /api/health and /api/cluster
 */
export function createHealthRoutes({ snapshots }: AppDeps) {
  return new Hono()
    .get('/', (c) => {
      return c.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
      });
    })
    .get('/status', async (c) => {
      return c.json(await snapshots.checkConnection());
    });
}
