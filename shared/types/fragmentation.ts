/**
 * GPU fragmentation analysis types
 */

import type { PodAllocation } from './snapshot';

export type FragmentationStatus = 'healthy' | 'fragmented' | 'critical';

export interface NodeFragmentation {
  nodeName: string;
  totalGPUs: number;
  allocatedGPUs: number;
  availableGPUs: number;
  fragmentationScore: number; // 0-100, higher is worse
  status: FragmentationStatus;
  utilizationPercent: number;
}

export interface AllocationPattern {
  fullyAllocatedPodCount: number;     // pods holding 4+ GPUs
  partiallyAllocatedPodCount: number; // pods holding 1-3 GPUs
  gpuSharingEnabled: boolean;
  /**
   * Free GPUs left after subtracting every pod's allocation. This is an
   * estimate of the largest block a new job could get, not a per-slot
   * contiguity result.
   */
  largestContiguousGPU: number;
}

export interface FragmentationSummary {
  healthyNodes: number;
  fragmentedNodes: number;
  criticalNodes: number;
  totalWastedGPUs: number;
  wastePercentage: number;
}

export interface ClusterFragmentationSummary {
  /** Mean node score. 100 when there are no nodes (nothing to report). */
  clusterScore: number;
  totalNodes: number;
  perNode: NodeFragmentation[];
  recommendations: string[];
  summary: FragmentationSummary;
}

export interface NodeFragmentationAnalysis {
  fragmentation: NodeFragmentation;
  pattern: AllocationPattern;
  recommendations: string[];
}

/**
 * Response of GET /api/nodes/fragmentation-analysis
 */
export interface FragmentationAnalysisResponse extends ClusterFragmentationSummary {
  cluster: string;
}

/**
 * Response of GET /api/nodes/:name/fragmentation and POST /api/analysis/nodes
 */
export interface NodeFragmentationDetail extends NodeFragmentationAnalysis {
  runningPods: PodAllocation[];
}
