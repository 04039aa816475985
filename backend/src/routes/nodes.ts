import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { zValidator } from '@hono/zod-validator';
import type {
  FragmentationAnalysisResponse,
  LoadBalanceAnalysisResponse,
  NodeFragmentationDetail,
  NodeSnapshot,
} from '@gpuscope/shared';
import type { AppDeps } from '../hono-app';
import { nodeParamsSchema, validationHook } from '../lib/validation';
import { analyzeClusterFragmentation, analyzeNodeFragmentation } from '../services/fragmentation';
import { analyzeLoadBalance } from '../services/loadBalance';

/**
 * Analyses of the live snapshot
 */
export function createNodesRoutes({ snapshots, config }: AppDeps) {
  // An empty cluster would otherwise be reported with the "nothing to
  // report" sentinel scores, which read as perfectly healthy
  function requireNodes(nodes: NodeSnapshot[]): void {
    if (nodes.length === 0) {
      throw new HTTPException(404, { message: 'No GPU nodes found' });
    }
  }

  return new Hono()
    .get('/', async (c) => {
      return c.json({ nodes: await snapshots.listNodes() });
    })
    .get('/fragmentation-analysis', async (c) => {
      const [{ nodes, podsByNode }, thresholds] = await Promise.all([snapshots.getSnapshot(), config.getThresholds()]);
      requireNodes(nodes);

      const response: FragmentationAnalysisResponse = {
        cluster: snapshots.getClusterName(),
        ...analyzeClusterFragmentation(nodes, podsByNode, thresholds),
      };
      return c.json(response);
    })
    .get('/load-balance-analysis', async (c) => {
      const [nodes, thresholds] = await Promise.all([snapshots.listNodes(), config.getThresholds()]);
      requireNodes(nodes);

      const response: LoadBalanceAnalysisResponse = {
        cluster: snapshots.getClusterName(),
        ...analyzeLoadBalance(nodes, thresholds),
      };
      return c.json(response);
    })
    .get('/:name/fragmentation', zValidator('param', nodeParamsSchema, validationHook), async (c) => {
      const { name } = c.req.valid('param');

      const node = await snapshots.getNode(name);
      if (!node) {
        throw new HTTPException(404, { message: `Node not found: ${name}` });
      }

      const [pods, thresholds] = await Promise.all([snapshots.listPods(name), config.getThresholds()]);
      const response: NodeFragmentationDetail = {
        ...analyzeNodeFragmentation(node, pods, thresholds),
        runningPods: pods,
      };
      return c.json(response);
    });
}
