import type {
  AllocationPattern,
  AnalysisThresholds,
  ClusterFragmentationSummary,
  FragmentationStatus,
  FragmentationSummary,
  FragmentationThresholds,
  NodeFragmentation,
  NodeFragmentationAnalysis,
  NodeSnapshot,
  PodAllocation,
  PodsByNode,
} from '@gpuscope/shared';
import { podsOnNode } from '../lib/podsByNode';
import { DEFAULT_THRESHOLDS } from './thresholds';

/**
 * GPU fragmentation analysis
 *
 * Scores how much of each node's GPU capacity is hard to use: capacity that
 * is free, capacity that is allocated but idle, and capacity split into
 * single-GPU pods that block larger jobs. Everything here is a pure function
 * of the snapshot passed in; nothing is cached or fetched.
 *
 * Inputs are not validated. A snapshot with more GPUs allocated than the
 * node has, or utilization outside 0-100, yields scores outside 0-100.
 */

export const NODE_RECOMMENDATIONS = {
  migrate: 'Critical fragmentation: consider migrating some pods to other nodes.',
  consolidate: 'Many small GPU allocations detected: consider consolidating workloads.',
  limitedBlocks: 'Limited contiguous GPU blocks: larger jobs will be difficult to schedule.',
  lowUtilization: 'Low GPU utilization despite allocation: check whether pods are idle or waiting.',
  healthy: 'Node GPU allocation is healthy.',
} as const;

export const CLUSTER_RECOMMENDATIONS = {
  critical: 'Critical fragmentation detected on some nodes: consider pod consolidation or rebalancing.',
  idleAllocated: 'Some nodes have allocated GPUs with low utilization: check whether pods are idle.',
  affinity: 'Some nodes have fragmented GPU allocation: consider pod affinity/anti-affinity rules.',
  healthy: 'Cluster GPU allocation is healthy. No action needed.',
} as const;

/**
 * Allocated share of the node's GPUs, 0 for a node without GPUs
 */
export function allocationRate(node: NodeSnapshot): number {
  return node.totalGPUs === 0 ? 0 : node.allocatedGPUs / node.totalGPUs;
}

/**
 * Penalty in [0, 1] for single-GPU pods crowding a node
 */
export function calculatePartialAllocationPenalty(
  pods: PodAllocation[],
  totalGPUs: number,
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): number {
  if (pods.length === 0) {
    return 0;
  }

  const smallAllocations = pods.filter((pod) => pod.allocatedGPUs === 1).length;

  let penalty = 0;
  if (totalGPUs >= thresholds.largeNodeGpus && smallAllocations > thresholds.smallPodsOnLargeNode) {
    penalty += thresholds.largeNodePenalty;
  }
  if (smallAllocations > thresholds.smallPodsOnAnyNode) {
    penalty += thresholds.anyNodePenalty;
  }

  return Math.min(Math.max(penalty, 0), 1);
}

/**
 * Fragmentation score for one node, 0 (none) to 100 (severe)
 */
export function calculateFragmentationScore(
  node: NodeSnapshot,
  pods: PodAllocation[],
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): number {
  const rate = allocationRate(node);
  // Share of the node that is allocated but not doing work
  const utilizationGap = Math.max(0, rate * 100 - node.utilizationPercent) / 100;
  const partialPenalty = calculatePartialAllocationPenalty(pods, node.totalGPUs, thresholds);

  const { weights } = thresholds;
  const score =
    (1 - rate) * weights.unusedCapacity +
    utilizationGap * weights.idleAllocation +
    partialPenalty * weights.partialAllocation;

  return Math.min(score, 100);
}

export function determineFragmentationStatus(
  score: number,
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): FragmentationStatus {
  if (score < thresholds.healthyBelow) {
    return 'healthy';
  }
  if (score < thresholds.criticalFrom) {
    return 'fragmented';
  }
  return 'critical';
}

export function calculateNodeFragmentation(
  node: NodeSnapshot,
  pods: PodAllocation[],
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): NodeFragmentation {
  const fragmentationScore = calculateFragmentationScore(node, pods, thresholds);

  return {
    nodeName: node.name,
    totalGPUs: node.totalGPUs,
    allocatedGPUs: node.allocatedGPUs,
    availableGPUs: node.totalGPUs - node.allocatedGPUs,
    fragmentationScore,
    status: determineFragmentationStatus(fragmentationScore, thresholds),
    utilizationPercent: node.utilizationPercent,
  };
}

export function buildAllocationPattern(
  pods: PodAllocation[],
  totalGPUs: number,
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): AllocationPattern {
  let fullyAllocatedPodCount = 0;
  let partiallyAllocatedPodCount = 0;
  let podGPUs = 0;

  for (const pod of pods) {
    if (pod.allocatedGPUs >= thresholds.largeAllocationGpus) {
      fullyAllocatedPodCount++;
    } else if (pod.allocatedGPUs > 0) {
      partiallyAllocatedPodCount++;
    }
    podGPUs += pod.allocatedGPUs;
  }

  return {
    fullyAllocatedPodCount,
    partiallyAllocatedPodCount,
    // Sharing is not visible in pod GPU requests
    gpuSharingEnabled: false,
    largestContiguousGPU: totalGPUs - podGPUs,
  };
}

export function generateNodeRecommendations(
  fragmentation: NodeFragmentation,
  pattern: AllocationPattern,
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): string[] {
  const recommendations: string[] = [];

  if (fragmentation.status === 'critical') {
    recommendations.push(NODE_RECOMMENDATIONS.migrate);
  }

  if (
    pattern.partiallyAllocatedPodCount > thresholds.consolidatePartialPods &&
    fragmentation.totalGPUs >= thresholds.largeNodeGpus
  ) {
    recommendations.push(NODE_RECOMMENDATIONS.consolidate);
  }

  if (
    fragmentation.availableGPUs > 0 &&
    fragmentation.availableGPUs < thresholds.minSchedulableBlock &&
    pattern.largestContiguousGPU < thresholds.minSchedulableBlock
  ) {
    recommendations.push(NODE_RECOMMENDATIONS.limitedBlocks);
  }

  if (
    fragmentation.utilizationPercent < thresholds.lowUtilizationPercent &&
    fragmentation.allocatedGPUs > 0
  ) {
    recommendations.push(NODE_RECOMMENDATIONS.lowUtilization);
  }

  if (recommendations.length === 0) {
    recommendations.push(NODE_RECOMMENDATIONS.healthy);
  }

  return recommendations;
}

export function buildFragmentationSummary(perNode: NodeFragmentation[]): FragmentationSummary {
  const summary: FragmentationSummary = {
    healthyNodes: 0,
    fragmentedNodes: 0,
    criticalNodes: 0,
    totalWastedGPUs: 0,
    wastePercentage: 0,
  };
  let totalGPUs = 0;

  for (const node of perNode) {
    switch (node.status) {
      case 'healthy':
        summary.healthyNodes++;
        break;
      case 'fragmented':
        summary.fragmentedNodes++;
        break;
      case 'critical':
        summary.criticalNodes++;
        break;
    }
    totalGPUs += node.totalGPUs;

    // Free GPUs on a fragmented or critical node are counted as wasted
    if (node.status !== 'healthy' && node.availableGPUs > 0) {
      summary.totalWastedGPUs += node.availableGPUs;
    }
  }

  if (totalGPUs > 0) {
    summary.wastePercentage = (summary.totalWastedGPUs / totalGPUs) * 100;
  }

  return summary;
}

export function generateFragmentationRecommendations(
  perNode: NodeFragmentation[],
  thresholds: FragmentationThresholds = DEFAULT_THRESHOLDS.fragmentation
): string[] {
  const recommendations: string[] = [];

  if (perNode.some((node) => node.status === 'critical')) {
    recommendations.push(CLUSTER_RECOMMENDATIONS.critical);
  }

  if (
    perNode.some(
      (node) => node.allocatedGPUs > 0 && node.utilizationPercent < thresholds.lowUtilizationPercent
    )
  ) {
    recommendations.push(CLUSTER_RECOMMENDATIONS.idleAllocated);
  }

  if (perNode.some((node) => node.status === 'fragmented' && node.availableGPUs > 0)) {
    recommendations.push(CLUSTER_RECOMMENDATIONS.affinity);
  }

  if (recommendations.length === 0) {
    recommendations.push(CLUSTER_RECOMMENDATIONS.healthy);
  }

  return recommendations;
}

/**
 * Fragmentation analysis of every node in a snapshot.
 *
 * With no nodes the cluster score is 100. That value only avoids a division
 * by zero; it means "nothing to report", not "fully healthy".
 */
export function analyzeClusterFragmentation(
  nodes: NodeSnapshot[],
  podsByNode: PodsByNode,
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS
): ClusterFragmentationSummary {
  const perNode = nodes.map((node) =>
    calculateNodeFragmentation(node, podsOnNode(podsByNode, node.name), thresholds.fragmentation)
  );

  const clusterScore =
    perNode.length === 0
      ? 100
      : perNode.reduce((sum, node) => sum + node.fragmentationScore, 0) / perNode.length;

  return {
    clusterScore,
    totalNodes: nodes.length,
    perNode,
    recommendations: generateFragmentationRecommendations(perNode, thresholds.fragmentation),
    summary: buildFragmentationSummary(perNode),
  };
}

/**
 * Fragmentation score, allocation pattern and advice for a single node
 */
export function analyzeNodeFragmentation(
  node: NodeSnapshot,
  pods: PodAllocation[],
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS
): NodeFragmentationAnalysis {
  const fragmentation = calculateNodeFragmentation(node, pods, thresholds.fragmentation);
  const pattern = buildAllocationPattern(pods, node.totalGPUs, thresholds.fragmentation);

  return {
    fragmentation,
    pattern,
    recommendations: generateNodeRecommendations(fragmentation, pattern, thresholds.fragmentation),
  };
}
