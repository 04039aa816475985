/**
 * Node analysis API (live cluster snapshot)
 */

import type { RequestFn } from './client';
import type {
  NodeSnapshot,
  FragmentationAnalysisResponse,
  NodeFragmentationDetail,
  LoadBalanceAnalysisResponse,
} from '../types';

export interface NodesApi {
  /** List GPU nodes in the current snapshot */
  list: () => Promise<{ nodes: NodeSnapshot[] }>;

  /** Cluster-wide fragmentation analysis */
  getFragmentationAnalysis: () => Promise<FragmentationAnalysisResponse>;

  /** Fragmentation detail for one node */
  getNodeFragmentation: (name: string) => Promise<NodeFragmentationDetail>;

  /** Cluster-wide load balance analysis */
  getLoadBalanceAnalysis: () => Promise<LoadBalanceAnalysisResponse>;
}

export function createNodesApi(request: RequestFn): NodesApi {
  return {
    list: () => request<{ nodes: NodeSnapshot[] }>('/nodes'),

    getFragmentationAnalysis: () =>
      request<FragmentationAnalysisResponse>('/nodes/fragmentation-analysis'),

    getNodeFragmentation: (name: string) =>
      request<NodeFragmentationDetail>(`/nodes/${encodeURIComponent(name)}/fragmentation`),

    getLoadBalanceAnalysis: () =>
      request<LoadBalanceAnalysisResponse>('/nodes/load-balance-analysis'),
  };
}
