import * as k8s from '@kubernetes/client-node';
import type { ClusterSnapshot, ClusterStatus, NodeSnapshot, PodAllocation, PodsByNode } from '@gpuscope/shared';
import { k8sRetry, getErrorStatusCode, type RetryOptions } from '../lib/retry';
import { componentLogger } from '../lib/logger';
import { addPodToNode, podsOnNode } from '../lib/podsByNode';
import type { GpuUtilizationSource } from './prometheus';
import { normalizeNodeSnapshot, normalizePodAllocation, type NodeSnapshotProvider } from './snapshots';

const log = componentLogger('kubernetes');

export const DEFAULT_GPU_RESOURCE = 'nvidia.com/gpu';

/**
 * The Kubernetes reads the provider needs
 */
export interface ClusterReader {
  currentContext(): string;
  listNodes(): Promise<k8s.V1Node[]>;
  readNode(name: string): Promise<k8s.V1Node>;
  listPods(fieldSelector?: string): Promise<k8s.V1Pod[]>;
}

/**
 * ClusterReader over the CoreV1 API of the current kubeconfig context
 */
export class CoreV1ClusterReader implements ClusterReader {
  private kc: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api;

  constructor(kc?: k8s.KubeConfig) {
    if (kc) {
      this.kc = kc;
    } else {
      this.kc = new k8s.KubeConfig();
      try {
        this.kc.loadFromDefault();
      } catch {
        log.warn('No kubeconfig found, cluster reads will fail');
      }
    }
    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
  }

  currentContext(): string {
    return this.kc.getCurrentContext();
  }

  async listNodes(): Promise<k8s.V1Node[]> {
    const response = await this.coreV1Api.listNode();
    return response.body.items;
  }

  async readNode(name: string): Promise<k8s.V1Node> {
    const response = await this.coreV1Api.readNode(name);
    return response.body;
  }

  async listPods(fieldSelector?: string): Promise<k8s.V1Pod[]> {
    const response = await this.coreV1Api.listPodForAllNamespaces(undefined, undefined, fieldSelector);
    return response.body.items;
  }
}

function parseGpuQuantity(value: string | undefined): number {
  if (!value) {
    return 0;
  }
  const count = parseInt(value, 10);
  return Number.isNaN(count) ? 0 : count;
}

/**
 * Allocatable GPUs on a node
 */
export function nodeGpuCapacity(node: k8s.V1Node, resourceName: string = DEFAULT_GPU_RESOURCE): number {
  return parseGpuQuantity(node.status?.allocatable?.[resourceName]);
}

/**
 * Pods that still hold their GPUs (not completed or failed)
 */
export function isActivePod(pod: k8s.V1Pod): boolean {
  const phase = pod.status?.phase;
  return phase === 'Running' || phase === 'Pending';
}

/**
 * GPUs requested by a pod's containers. A container without a request
 * counts its limit, which Kubernetes uses as the request for extended
 * resources.
 */
export function podGpuRequest(pod: k8s.V1Pod, resourceName: string = DEFAULT_GPU_RESOURCE): number {
  let total = 0;
  for (const container of pod.spec?.containers ?? []) {
    const request = container.resources?.requests?.[resourceName];
    total += request ? parseGpuQuantity(request) : parseGpuQuantity(container.resources?.limits?.[resourceName]);
  }
  return total;
}

export function toPodAllocation(pod: k8s.V1Pod, resourceName: string = DEFAULT_GPU_RESOURCE): PodAllocation {
  return normalizePodAllocation({
    podName: pod.metadata?.name ?? 'unknown',
    namespace: pod.metadata?.namespace ?? 'default',
    allocatedGPUs: podGpuRequest(pod, resourceName),
  });
}

/**
 * Active pods with a GPU request, grouped by the node they are bound to
 */
export function groupGpuPodsByNode(pods: k8s.V1Pod[], resourceName: string = DEFAULT_GPU_RESOURCE): PodsByNode {
  const podsByNode: PodsByNode = {};
  for (const pod of pods) {
    const nodeName = pod.spec?.nodeName;
    if (!nodeName || !isActivePod(pod)) {
      continue;
    }
    const allocation = toPodAllocation(pod, resourceName);
    if (allocation.allocatedGPUs === 0) {
      continue;
    }
    addPodToNode(podsByNode, nodeName, allocation);
  }
  return podsByNode;
}

/**
 * Snapshots of every GPU node, sorted by name. Allocation is the sum of the
 * node's GPU pod requests; utilization defaults to 0 when telemetry has no
 * sample for the node.
 */
export function buildNodeSnapshots(
  nodes: k8s.V1Node[],
  podsByNode: PodsByNode,
  utilization: Map<string, number>,
  resourceName: string = DEFAULT_GPU_RESOURCE
): NodeSnapshot[] {
  const snapshots: NodeSnapshot[] = [];

  for (const node of nodes) {
    const name = node.metadata?.name;
    const totalGPUs = nodeGpuCapacity(node, resourceName);
    if (!name || totalGPUs <= 0) {
      continue;
    }

    const allocatedGPUs = podsOnNode(podsByNode, name).reduce((sum, pod) => sum + pod.allocatedGPUs, 0);
    snapshots.push(
      normalizeNodeSnapshot({
        name,
        totalGPUs,
        allocatedGPUs,
        utilizationPercent: utilization.get(name) ?? 0,
      })
    );
  }

  return snapshots.sort((a, b) => a.name.localeCompare(b.name));
}

export interface KubernetesSnapshotProviderOptions {
  reader?: ClusterReader;
  utilization?: GpuUtilizationSource;
  resourceName?: string;
  retry?: RetryOptions;
}

const noUtilization: GpuUtilizationSource = {
  getUtilization: async () => new Map(),
};

/**
 * Live snapshots from the Kubernetes API, with utilization from an
 * optional telemetry source
 */
export class KubernetesSnapshotProvider implements NodeSnapshotProvider {
  private reader: ClusterReader;
  private utilization: GpuUtilizationSource;
  private resourceName: string;
  private retry: RetryOptions;

  constructor(options: KubernetesSnapshotProviderOptions = {}) {
    this.reader = options.reader ?? new CoreV1ClusterReader();
    this.utilization = options.utilization ?? noUtilization;
    this.resourceName = options.resourceName ?? DEFAULT_GPU_RESOURCE;
    this.retry = options.retry ?? {};
  }

  async checkConnection(): Promise<ClusterStatus> {
    try {
      await k8sRetry(() => this.reader.listNodes(), {
        ...this.retry,
        operationName: 'checkConnection',
        maxRetries: Math.min(this.retry.maxRetries ?? 2, 2),
      });
      return { connected: true, clusterName: this.getClusterName(), source: 'kubernetes' };
    } catch (error) {
      return {
        connected: false,
        source: 'kubernetes',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  getClusterName(): string {
    return this.reader.currentContext() || 'unknown';
  }

  async listNodes(): Promise<NodeSnapshot[]> {
    return (await this.getSnapshot()).nodes;
  }

  /**
   * One node list and one pod list, so each node's allocation and its pod
   * list describe the same moment
   */
  async getSnapshot(): Promise<ClusterSnapshot> {
    try {
      const [nodes, pods, utilization] = await Promise.all([
        k8sRetry(() => this.reader.listNodes(), { ...this.retry, operationName: 'getSnapshot:listNodes' }),
        k8sRetry(() => this.reader.listPods(), { ...this.retry, operationName: 'getSnapshot:listPods' }),
        this.utilization.getUtilization(),
      ]);
      const grouped = groupGpuPodsByNode(pods, this.resourceName);
      const snapshots = buildNodeSnapshots(nodes, grouped, utilization, this.resourceName);

      const podsByNode: PodsByNode = {};
      for (const node of snapshots) {
        podsByNode[node.name] = podsOnNode(grouped, node.name);
      }
      return { nodes: snapshots, podsByNode };
    } catch (error) {
      log.error({ error }, 'Error reading GPU nodes and pods');
      return { nodes: [], podsByNode: {} };
    }
  }

  async getNode(name: string): Promise<NodeSnapshot | null> {
    try {
      const [node, pods, utilization] = await Promise.all([
        k8sRetry(() => this.reader.readNode(name), { ...this.retry, operationName: 'getNode' }),
        this.fetchNodePods(name),
        this.utilization.getUtilization(),
      ]);
      const [snapshot] = buildNodeSnapshots([node], { [name]: pods }, utilization, this.resourceName);
      return snapshot ?? null;
    } catch (error) {
      if (getErrorStatusCode(error) === 404) {
        log.debug({ node: name }, 'Node not found');
      } else {
        log.error({ error, node: name }, 'Error reading node');
      }
      return null;
    }
  }

  async listPods(nodeName: string): Promise<PodAllocation[]> {
    try {
      return await this.fetchNodePods(nodeName);
    } catch (error) {
      log.error({ error, node: nodeName }, 'Error listing pods for node');
      return [];
    }
  }

  async listPodsByNode(): Promise<PodsByNode> {
    return (await this.getSnapshot()).podsByNode;
  }

  private async fetchNodePods(nodeName: string): Promise<PodAllocation[]> {
    const pods = await k8sRetry(() => this.reader.listPods(`spec.nodeName=${nodeName}`), {
      ...this.retry,
      operationName: 'listPods',
    });
    return podsOnNode(groupGpuPodsByNode(pods, this.resourceName), nodeName);
  }
}
