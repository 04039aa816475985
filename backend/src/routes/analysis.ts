import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { NodeFragmentationDetail } from '@gpuscope/shared';
import type { AppDeps } from '../hono-app';
import {
  fragmentationRequestSchema,
  loadBalanceRequestSchema,
  nodeAnalysisRequestSchema,
  validationHook,
} from '../lib/validation';
import { analyzeClusterFragmentation, analyzeNodeFragmentation } from '../services/fragmentation';
import { analyzeLoadBalance } from '../services/loadBalance';

/**
 * What-if analyses over caller-supplied snapshots. Nothing is read from
 * the cluster; only the configured thresholds are shared with the live routes.
 */
export function createAnalysisRoutes({ config }: AppDeps) {
  return new Hono()
    .post('/fragmentation', zValidator('json', fragmentationRequestSchema, validationHook), async (c) => {
      const { nodes, podsByNode } = c.req.valid('json');
      return c.json(analyzeClusterFragmentation(nodes, podsByNode, await config.getThresholds()));
    })
    .post('/nodes', zValidator('json', nodeAnalysisRequestSchema, validationHook), async (c) => {
      const { node, pods } = c.req.valid('json');
      const response: NodeFragmentationDetail = {
        ...analyzeNodeFragmentation(node, pods, await config.getThresholds()),
        runningPods: pods,
      };
      return c.json(response);
    })
    .post('/load-balance', zValidator('json', loadBalanceRequestSchema, validationHook), async (c) => {
      const { nodes } = c.req.valid('json');
      return c.json(analyzeLoadBalance(nodes, await config.getThresholds()));
    });
}
