import type {
  AnalysisThresholds,
  LoadBalanceStats,
  LoadBalanceSummary,
  LoadBalanceThresholds,
  NodeLoad,
  NodeSnapshot,
} from '@gpuscope/shared';
import { DEFAULT_THRESHOLDS } from './thresholds';

export const LOAD_BALANCE_RECOMMENDATIONS = {
  hotspots: 'Hotspot nodes detected with high GPU load: consider rebalancing workloads.',
  idle: 'Idle nodes detected with low GPU load: consider consolidating workloads or draining nodes.',
  highVariance: 'High variance in node allocation: consider implementing pod scheduling strategies.',
  lowAllocation: 'Overall cluster GPU allocation is low: consider optimizing resource requests.',
  balanced: 'Cluster load is well balanced. No action needed.',
} as const;

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population variance around the given mean
 */
function populationVariance(values: number[], avg: number): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
}

export function calculateNodeLoad(
  node: NodeSnapshot,
  thresholds: LoadBalanceThresholds = DEFAULT_THRESHOLDS.loadBalance
): NodeLoad {
  const allocationRatePercent = node.totalGPUs > 0 ? (node.allocatedGPUs / node.totalGPUs) * 100 : 0;
  const utilizationRatePercent = node.utilizationPercent;

  return {
    nodeName: node.name,
    allocationRatePercent,
    utilizationRatePercent,
    loadScore:
      allocationRatePercent * thresholds.allocationWeight +
      utilizationRatePercent * thresholds.utilizationWeight,
  };
}

/**
 * Balance score from the coefficient of variation of allocation rates.
 * 100 = every node equally allocated, 0 = CV of 1 or more.
 * An empty cluster scores 100, which means "nothing to report".
 */
export function calculateLoadBalanceScore(nodeLoads: NodeLoad[]): number {
  if (nodeLoads.length === 0) {
    return 100;
  }

  const rates = nodeLoads.map((load) => load.allocationRatePercent);
  const avg = mean(rates);
  const stddev = Math.sqrt(populationVariance(rates, avg));
  const cv = avg > 0 ? stddev / avg : 0;

  return 100 * (1 - Math.min(cv, 1));
}

/**
 * Nodes whose load score sits more than `hotspotBand` points above or below
 * the mean load score
 */
export function identifyHotspotAndIdleNodes(
  nodeLoads: NodeLoad[],
  thresholds: LoadBalanceThresholds = DEFAULT_THRESHOLDS.loadBalance
): { hotspotNodeNames: string[]; idleNodeNames: string[] } {
  const hotspotNodeNames: string[] = [];
  const idleNodeNames: string[] = [];

  if (nodeLoads.length === 0) {
    return { hotspotNodeNames, idleNodeNames };
  }

  const meanLoad = mean(nodeLoads.map((load) => load.loadScore));

  for (const load of nodeLoads) {
    if (load.loadScore > meanLoad + thresholds.hotspotBand) {
      hotspotNodeNames.push(load.nodeName);
    } else if (load.loadScore < meanLoad - thresholds.hotspotBand) {
      idleNodeNames.push(load.nodeName);
    }
  }

  return { hotspotNodeNames, idleNodeNames };
}

/**
 * Allocation-rate statistics; all zero for an empty cluster
 */
export function calculateLoadBalanceStats(nodeLoads: NodeLoad[]): LoadBalanceStats {
  if (nodeLoads.length === 0) {
    return { avg: 0, stddev: 0, max: 0, min: 0, variance: 0 };
  }

  const rates = nodeLoads.map((load) => load.allocationRatePercent);
  const avg = mean(rates);
  const variance = populationVariance(rates, avg);

  return {
    avg,
    stddev: Math.sqrt(variance),
    max: Math.max(...rates),
    min: Math.min(...rates),
    variance,
  };
}

export function generateLoadBalanceRecommendations(
  stats: LoadBalanceStats,
  hotspotNodeNames: string[],
  idleNodeNames: string[],
  thresholds: LoadBalanceThresholds = DEFAULT_THRESHOLDS.loadBalance
): string[] {
  const recommendations: string[] = [];

  if (hotspotNodeNames.length > 0) {
    recommendations.push(LOAD_BALANCE_RECOMMENDATIONS.hotspots);
  }

  if (idleNodeNames.length > 0) {
    recommendations.push(LOAD_BALANCE_RECOMMENDATIONS.idle);
  }

  if (stats.stddev > thresholds.highStddev) {
    recommendations.push(LOAD_BALANCE_RECOMMENDATIONS.highVariance);
  }

  if (stats.avg < thresholds.lowMeanAllocation) {
    recommendations.push(LOAD_BALANCE_RECOMMENDATIONS.lowAllocation);
  }

  if (recommendations.length === 0) {
    recommendations.push(LOAD_BALANCE_RECOMMENDATIONS.balanced);
  }

  return recommendations;
}

/**
 * Load distribution across a snapshot's nodes.
 *
 * An empty cluster scores 100 with zeroed stats and gets only the
 * `balanced` recommendation, never `lowAllocation`.
 */
export function analyzeLoadBalance(
  nodes: NodeSnapshot[],
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS
): LoadBalanceSummary {
  const perNode = nodes.map((node) => calculateNodeLoad(node, thresholds.loadBalance));
  const { hotspotNodeNames, idleNodeNames } = identifyHotspotAndIdleNodes(perNode, thresholds.loadBalance);
  const stats = calculateLoadBalanceStats(perNode);

  return {
    clusterLoadBalanceScore: calculateLoadBalanceScore(perNode),
    perNode,
    hotspotNodeNames,
    idleNodeNames,
    stats,
    recommendations:
      perNode.length === 0
        ? [LOAD_BALANCE_RECOMMENDATIONS.balanced]
        : generateLoadBalanceRecommendations(stats, hotspotNodeNames, idleNodeNames, thresholds.loadBalance),
  };
}
