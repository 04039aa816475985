import type { PodAllocation, PodsByNode } from '@gpuscope/shared';

/**
 * Pods recorded for a node. Only own keys count, so a node named after an
 * Object.prototype member (`constructor`, `toString`) gets an empty list.
 */
export function podsOnNode(podsByNode: PodsByNode, nodeName: string): PodAllocation[] {
  return Object.hasOwn(podsByNode, nodeName) ? podsByNode[nodeName] : [];
}

export function addPodToNode(podsByNode: PodsByNode, nodeName: string, pod: PodAllocation): void {
  if (Object.hasOwn(podsByNode, nodeName)) {
    podsByNode[nodeName].push(pod);
  } else {
    podsByNode[nodeName] = [pod];
  }
}
