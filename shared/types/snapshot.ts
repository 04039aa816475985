/**
 * Cluster snapshot types
 *
 * A snapshot is what the monitoring side knows about one cluster at one
 * instant: every GPU node with its capacity, allocation and utilization,
 * plus the GPU pods bound to each node.
 */

export interface NodeSnapshot {
  name: string;
  totalGPUs: number;          // allocatable GPUs on the node
  allocatedGPUs: number;      // GPUs requested by active pods
  utilizationPercent: number; // average GPU utilization reported by telemetry
}

export interface PodAllocation {
  podName: string;
  namespace: string;
  allocatedGPUs: number;
}

/**
 * Pods per node, keyed by node name
 */
export type PodsByNode = Record<string, PodAllocation[]>;

export interface ClusterStatus {
  connected: boolean;
  clusterName?: string;
  source: 'kubernetes' | 'static';
  error?: string;
}

/**
 * Nodes and their pods taken from the same read of the cluster
 */
export interface ClusterSnapshot {
  nodes: NodeSnapshot[];
  podsByNode: PodsByNode;
}
