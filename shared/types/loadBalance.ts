/**
 * Load balance analysis types
 */

export interface NodeLoad {
  nodeName: string;
  allocationRatePercent: number;
  utilizationRatePercent: number;
  loadScore: number; // weighted blend of allocation and utilization
}

export interface LoadBalanceStats {
  avg: number;
  stddev: number;
  max: number;
  min: number;
  variance: number;
}

export interface LoadBalanceSummary {
  /** 0-100, higher is better balanced. 100 when there are no nodes. */
  clusterLoadBalanceScore: number;
  perNode: NodeLoad[];
  hotspotNodeNames: string[];
  idleNodeNames: string[];
  stats: LoadBalanceStats;
  recommendations: string[];
}

/**
 * Response of GET /api/nodes/load-balance-analysis
 */
export interface LoadBalanceAnalysisResponse extends LoadBalanceSummary {
  cluster: string;
}
