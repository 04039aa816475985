/**
 * Analysis threshold settings
 *
 * Every constant the analysis engine compares against lives here so the
 * values can be tuned per cluster without code changes.
 */

export interface FragmentationThresholds {
  /** Scores below this are healthy */
  healthyBelow: number;
  /** Scores at or above this are critical */
  criticalFrom: number;
  /** Points for unused capacity, allocated-but-idle capacity and small allocations */
  weights: {
    unusedCapacity: number;
    idleAllocation: number;
    partialAllocation: number;
  };
  /** Pods with at least this many GPUs count as fully allocated */
  largeAllocationGpus: number;
  /** Nodes with at least this many GPUs are "large" for the small-pod penalty */
  largeNodeGpus: number;
  /** Single-GPU pods tolerated on a large node before it is penalised */
  smallPodsOnLargeNode: number;
  largeNodePenalty: number;
  /** Single-GPU pods tolerated on any node before it is penalised */
  smallPodsOnAnyNode: number;
  anyNodePenalty: number;
  /** Utilization below this on a node with allocations counts as idle */
  lowUtilizationPercent: number;
  /** Partially allocated pods tolerated on a large node before consolidation is advised */
  consolidatePartialPods: number;
  /** Free-block size below which large jobs are considered hard to place */
  minSchedulableBlock: number;
}

export interface LoadBalanceThresholds {
  allocationWeight: number;
  utilizationWeight: number;
  /**
   * Distance from the mean load score that makes a node a hotspot or idle.
   * Fixed, not derived from the spread of the data: a cluster whose nodes
   * all sit within the band reports neither, however loaded they are.
   */
  hotspotBand: number;
  /** Allocation-rate standard deviation above which variance is flagged */
  highStddev: number;
  /** Mean allocation rate below which overall allocation is flagged */
  lowMeanAllocation: number;
}

export interface AnalysisThresholds {
  fragmentation: FragmentationThresholds;
  loadBalance: LoadBalanceThresholds;
}

/**
 * Partial override accepted by PUT /api/settings
 */
export interface AnalysisThresholdsOverride {
  fragmentation?: Partial<Omit<FragmentationThresholds, 'weights'>> & {
    weights?: Partial<FragmentationThresholds['weights']>;
  };
  loadBalance?: Partial<LoadBalanceThresholds>;
}

export interface SettingsResponse {
  thresholds: AnalysisThresholds;
  overrides: AnalysisThresholdsOverride;
}

export interface UpdateSettingsResponse {
  message: string;
  thresholds: AnalysisThresholds;
}
