import { describe, test, expect, vi } from 'vitest';
import type { V1Node, V1Pod } from '@kubernetes/client-node';
import {
  buildNodeSnapshots,
  groupGpuPodsByNode,
  KubernetesSnapshotProvider,
  podGpuRequest,
  type ClusterReader,
} from './kubernetes';

function gpuNode(name: string, gpus?: string): V1Node {
  return {
    metadata: { name },
    status: { allocatable: gpus === undefined ? { cpu: '32' } : { cpu: '32', 'nvidia.com/gpu': gpus } },
  };
}

function gpuPod(
  name: string,
  nodeName: string | undefined,
  containers: Array<{ requests?: Record<string, string>; limits?: Record<string, string> }>,
  phase = 'Running'
): V1Pod {
  return {
    metadata: { name, namespace: 'ml' },
    spec: {
      nodeName,
      containers: containers.map((resources, i) => ({ name: `c${i}`, resources })),
    },
    status: { phase },
  };
}

describe('podGpuRequest', () => {
  test('sums requests across containers', () => {
    const pod = gpuPod('p', 'n', [{ requests: { 'nvidia.com/gpu': '2' } }, { requests: { 'nvidia.com/gpu': '1' } }]);
    expect(podGpuRequest(pod)).toBe(3);
  });

  test('falls back to the limit when a container has no request', () => {
    const pod = gpuPod('p', 'n', [{ limits: { 'nvidia.com/gpu': '4' } }, { requests: { cpu: '1' } }]);
    expect(podGpuRequest(pod)).toBe(4);
  });

  test('honours a custom resource name', () => {
    const pod = gpuPod('p', 'n', [{ requests: { 'amd.com/gpu': '2', 'nvidia.com/gpu': '1' } }]);
    expect(podGpuRequest(pod, 'amd.com/gpu')).toBe(2);
  });
});

describe('groupGpuPodsByNode', () => {
  test('keeps active GPU pods bound to a node', () => {
    const pods = [
      gpuPod('train-0', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '2' } }]),
      gpuPod('queued', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '1' } }], 'Pending'),
      gpuPod('done', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '4' } }], 'Succeeded'),
      gpuPod('unscheduled', undefined, [{ requests: { 'nvidia.com/gpu': '1' } }], 'Pending'),
      gpuPod('web', 'gpu-1', [{ requests: { cpu: '1' } }]),
    ];

    expect(groupGpuPodsByNode(pods)).toEqual({
      'gpu-1': [
        { podName: 'train-0', namespace: 'ml', allocatedGPUs: 2 },
        { podName: 'queued', namespace: 'ml', allocatedGPUs: 1 },
      ],
    });
  });
});

describe('buildNodeSnapshots', () => {
  test('builds sorted snapshots for GPU nodes only', () => {
    const nodes = [gpuNode('gpu-b', '4'), gpuNode('cpu-1'), gpuNode('gpu-a', '8'), gpuNode('gpu-zero', '0')];
    const podsByNode = {
      'gpu-a': [
        { podName: 'a', namespace: 'ml', allocatedGPUs: 2 },
        { podName: 'b', namespace: 'ml', allocatedGPUs: 1 },
      ],
    };

    expect(buildNodeSnapshots(nodes, podsByNode, new Map([['gpu-a', 66]]))).toEqual([
      { name: 'gpu-a', totalGPUs: 8, allocatedGPUs: 3, utilizationPercent: 66 },
      { name: 'gpu-b', totalGPUs: 4, allocatedGPUs: 0, utilizationPercent: 0 },
    ]);
  });

  test('clamps over-allocation and out-of-range utilization', () => {
    const podsByNode = { 'gpu-a': [{ podName: 'big', namespace: 'ml', allocatedGPUs: 6 }] };
    expect(buildNodeSnapshots([gpuNode('gpu-a', '4')], podsByNode, new Map([['gpu-a', 130]]))).toEqual([
      { name: 'gpu-a', totalGPUs: 4, allocatedGPUs: 4, utilizationPercent: 100 },
    ]);
  });
});

function fakeReader(nodes: V1Node[], pods: V1Pod[]): ClusterReader {
  return {
    currentContext: () => 'test-context',
    listNodes: vi.fn(async () => nodes),
    readNode: vi.fn(async (name: string) => {
      const node = nodes.find((n) => n.metadata?.name === name);
      if (!node) {
        throw Object.assign(new Error('HTTP request failed'), { statusCode: 404 });
      }
      return node;
    }),
    listPods: vi.fn(async (fieldSelector?: string) => {
      const nodeName = fieldSelector?.replace('spec.nodeName=', '');
      return nodeName ? pods.filter((p) => p.spec?.nodeName === nodeName) : pods;
    }),
  };
}

describe('KubernetesSnapshotProvider', () => {
  const nodes = [gpuNode('gpu-1', '8'), gpuNode('gpu-2', '4'), gpuNode('cpu-1')];
  const pods = [
    gpuPod('train-0', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '4' } }]),
    gpuPod('infer-0', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '1' } }]),
  ];
  const utilization = { getUtilization: async () => new Map([['gpu-1', 80]]) };

  test('lists GPU nodes with allocation and utilization', async () => {
    const provider = new KubernetesSnapshotProvider({ reader: fakeReader(nodes, pods), utilization });
    expect(await provider.listNodes()).toEqual([
      { name: 'gpu-1', totalGPUs: 8, allocatedGPUs: 5, utilizationPercent: 80 },
      { name: 'gpu-2', totalGPUs: 4, allocatedGPUs: 0, utilizationPercent: 0 },
    ]);
  });

  test('gives every GPU node a pod list', async () => {
    const provider = new KubernetesSnapshotProvider({ reader: fakeReader(nodes, pods) });
    expect(await provider.listPodsByNode()).toEqual({
      'gpu-1': [
        { podName: 'train-0', namespace: 'ml', allocatedGPUs: 4 },
        { podName: 'infer-0', namespace: 'ml', allocatedGPUs: 1 },
      ],
      'gpu-2': [],
    });
  });

  test('reads a single node through a field selector', async () => {
    const reader = fakeReader(nodes, pods);
    const provider = new KubernetesSnapshotProvider({ reader, utilization });

    expect(await provider.getNode('gpu-1')).toEqual({
      name: 'gpu-1',
      totalGPUs: 8,
      allocatedGPUs: 5,
      utilizationPercent: 80,
    });
    expect(reader.listPods).toHaveBeenCalledWith('spec.nodeName=gpu-1');
  });

  test('returns null for unknown and non-GPU nodes', async () => {
    const provider = new KubernetesSnapshotProvider({ reader: fakeReader(nodes, pods), retry: { maxRetries: 0 } });
    expect(await provider.getNode('missing')).toBeNull();
    expect(await provider.getNode('cpu-1')).toBeNull();
  });

  test('reports no data when the API fails', async () => {
    const reader: ClusterReader = {
      currentContext: () => 'test-context',
      listNodes: async () => {
        throw Object.assign(new Error('forbidden'), { statusCode: 403 });
      },
      readNode: async () => {
        throw Object.assign(new Error('forbidden'), { statusCode: 403 });
      },
      listPods: async () => {
        throw Object.assign(new Error('forbidden'), { statusCode: 403 });
      },
    };
    const provider = new KubernetesSnapshotProvider({ reader, retry: { maxRetries: 0 } });

    expect(await provider.listNodes()).toEqual([]);
    expect(await provider.listPodsByNode()).toEqual({});
    expect(await provider.listPods('gpu-1')).toEqual([]);
    expect(await provider.checkConnection()).toEqual({ connected: false, source: 'kubernetes', error: 'forbidden' });
  });

  test('reports the current context when connected', async () => {
    const provider = new KubernetesSnapshotProvider({ reader: fakeReader(nodes, pods) });
    expect(await provider.checkConnection()).toEqual({
      connected: true,
      clusterName: 'test-context',
      source: 'kubernetes',
    });
  });
});

describe('node named constructor', () => {
  test('builds a snapshot without pods', () => {
    expect(buildNodeSnapshots([gpuNode('constructor', '8')], groupGpuPodsByNode([]), new Map())).toEqual([
      { name: 'constructor', totalGPUs: 8, allocatedGPUs: 0, utilizationPercent: 0 },
    ]);
  });

  test('groups pods bound to it', () => {
    const pods = [
      gpuPod('a', 'constructor', [{ requests: { 'nvidia.com/gpu': '1' } }]),
      gpuPod('b', 'constructor', [{ requests: { 'nvidia.com/gpu': '2' } }]),
    ];
    expect(buildNodeSnapshots([gpuNode('constructor', '8')], groupGpuPodsByNode(pods), new Map())).toEqual([
      { name: 'constructor', totalGPUs: 8, allocatedGPUs: 3, utilizationPercent: 0 },
    ]);
  });

  test('is listed by the provider', async () => {
    const provider = new KubernetesSnapshotProvider({ reader: fakeReader([gpuNode('constructor', '4')], []) });
    expect(await provider.listNodes()).toEqual([
      { name: 'constructor', totalGPUs: 4, allocatedGPUs: 0, utilizationPercent: 0 },
    ]);
    expect(await provider.listPods('constructor')).toEqual([]);
  });
});

describe('KubernetesSnapshotProvider.getSnapshot', () => {
  test('takes nodes and pods from one node list and one pod list', async () => {
    const reader = fakeReader(
      [gpuNode('gpu-1', '8'), gpuNode('gpu-2', '4'), gpuNode('cpu-1')],
      [gpuPod('train-0', 'gpu-1', [{ requests: { 'nvidia.com/gpu': '2' } }])]
    );
    const provider = new KubernetesSnapshotProvider({ reader });

    expect(await provider.getSnapshot()).toEqual({
      nodes: [
        { name: 'gpu-1', totalGPUs: 8, allocatedGPUs: 2, utilizationPercent: 0 },
        { name: 'gpu-2', totalGPUs: 4, allocatedGPUs: 0, utilizationPercent: 0 },
      ],
      podsByNode: {
        'gpu-1': [{ podName: 'train-0', namespace: 'ml', allocatedGPUs: 2 }],
        'gpu-2': [],
      },
    });
    expect(reader.listNodes).toHaveBeenCalledTimes(1);
    expect(reader.listPods).toHaveBeenCalledTimes(1);
    expect(reader.listPods).toHaveBeenCalledWith();
  });
});
