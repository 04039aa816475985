/**
 * What-if analysis API
 *
 * Runs the analysis engine over a caller-supplied snapshot instead of the
 * live cluster.
 */

import type { RequestFn } from './client';
import type {
  NodeSnapshot,
  PodAllocation,
  PodsByNode,
  ClusterFragmentationSummary,
  NodeFragmentationDetail,
  LoadBalanceSummary,
} from '../types';

export interface AnalysisApi {
  fragmentation: (nodes: NodeSnapshot[], podsByNode?: PodsByNode) => Promise<ClusterFragmentationSummary>;
  node: (node: NodeSnapshot, pods?: PodAllocation[]) => Promise<NodeFragmentationDetail>;
  loadBalance: (nodes: NodeSnapshot[]) => Promise<LoadBalanceSummary>;
}

export function createAnalysisApi(request: RequestFn): AnalysisApi {
  return {
    fragmentation: (nodes, podsByNode = {}) =>
      request<ClusterFragmentationSummary>('/analysis/fragmentation', {
        method: 'POST',
        body: JSON.stringify({ nodes, podsByNode }),
      }),

    node: (node, pods = []) =>
      request<NodeFragmentationDetail>('/analysis/nodes', {
        method: 'POST',
        body: JSON.stringify({ node, pods }),
      }),

    loadBalance: (nodes) =>
      request<LoadBalanceSummary>('/analysis/load-balance', {
        method: 'POST',
        body: JSON.stringify({ nodes }),
      }),
  };
}
