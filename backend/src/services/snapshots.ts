import type { ClusterSnapshot, ClusterStatus, NodeSnapshot, PodAllocation, PodsByNode } from '@gpuscope/shared';
import { componentLogger } from '../lib/logger';
import { podsOnNode } from '../lib/podsByNode';

const log = componentLogger('snapshots');

/**
 * Source of node and pod snapshots for one cluster.
 *
 * Implementations own I/O, retries and timeouts. A failed read is reported
 * as "no data" (empty list, null node) after logging, never thrown into the
 * analysis code.
 */
export interface NodeSnapshotProvider {
  checkConnection(): Promise<ClusterStatus>;
  /** Name reported alongside live analyses */
  getClusterName(): string;
  /** GPU nodes, in a stable order */
  listNodes(): Promise<NodeSnapshot[]>;
  getNode(name: string): Promise<NodeSnapshot | null>;
  /** Active GPU pods on one node */
  listPods(nodeName: string): Promise<PodAllocation[]>;
  /** Active GPU pods on every GPU node */
  listPodsByNode(): Promise<PodsByNode>;
  /** GPU nodes and their pods from a single read */
  getSnapshot(): Promise<ClusterSnapshot>;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Bring a snapshot read from telemetry into range: GPU counts become
 * non-negative integers, allocation is capped at capacity and utilization
 * at 0-100. Adjustments are logged.
 */
export function normalizeNodeSnapshot(node: NodeSnapshot): NodeSnapshot {
  const totalGPUs = Number.isFinite(node.totalGPUs) ? Math.max(0, Math.floor(node.totalGPUs)) : 0;
  const allocatedGPUs = Number.isFinite(node.allocatedGPUs)
    ? clamp(Math.floor(node.allocatedGPUs), 0, totalGPUs)
    : 0;
  const utilizationPercent = Number.isFinite(node.utilizationPercent)
    ? clamp(node.utilizationPercent, 0, 100)
    : 0;

  if (
    totalGPUs !== node.totalGPUs ||
    allocatedGPUs !== node.allocatedGPUs ||
    utilizationPercent !== node.utilizationPercent
  ) {
    log.warn(
      {
        node: node.name,
        original: {
          totalGPUs: node.totalGPUs,
          allocatedGPUs: node.allocatedGPUs,
          utilizationPercent: node.utilizationPercent,
        },
        normalized: { totalGPUs, allocatedGPUs, utilizationPercent },
      },
      `Clamped out-of-range snapshot for node ${node.name}`
    );
  }

  return { name: node.name, totalGPUs, allocatedGPUs, utilizationPercent };
}

export function normalizePodAllocation(pod: PodAllocation): PodAllocation {
  const allocatedGPUs = Number.isFinite(pod.allocatedGPUs) ? Math.max(0, Math.floor(pod.allocatedGPUs)) : 0;
  return { ...pod, allocatedGPUs };
}

export interface StaticSnapshot {
  nodes: NodeSnapshot[];
  podsByNode?: PodsByNode;
  clusterName?: string;
}

/**
 * Provider over a fixed in-memory snapshot
 */
export class StaticSnapshotProvider implements NodeSnapshotProvider {
  private nodes: NodeSnapshot[];
  private podsByNode: PodsByNode;
  private clusterName: string;

  constructor(snapshot: StaticSnapshot) {
    this.nodes = snapshot.nodes;
    this.podsByNode = snapshot.podsByNode ?? {};
    this.clusterName = snapshot.clusterName ?? 'static';
  }

  async checkConnection(): Promise<ClusterStatus> {
    return { connected: true, clusterName: this.clusterName, source: 'static' };
  }

  getClusterName(): string {
    return this.clusterName;
  }

  async listNodes(): Promise<NodeSnapshot[]> {
    return [...this.nodes];
  }

  async getNode(name: string): Promise<NodeSnapshot | null> {
    return this.nodes.find((node) => node.name === name) ?? null;
  }

  async listPods(nodeName: string): Promise<PodAllocation[]> {
    return [...podsOnNode(this.podsByNode, nodeName)];
  }

  async listPodsByNode(): Promise<PodsByNode> {
    const result: PodsByNode = {};
    for (const node of this.nodes) {
      result[node.name] = [...podsOnNode(this.podsByNode, node.name)];
    }
    return result;
  }

  async getSnapshot(): Promise<ClusterSnapshot> {
    return { nodes: await this.listNodes(), podsByNode: await this.listPodsByNode() };
  }
}
