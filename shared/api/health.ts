/**
 * Health API
 */

import type { RequestFn } from './client';
import type { ClusterStatus } from '../types';

export interface HealthCheckResponse {
  status: string;
  timestamp: string;
}

export interface HealthApi {
  /** Check API health */
  check: () => Promise<HealthCheckResponse>;

  /** Get snapshot source connection status */
  clusterStatus: () => Promise<ClusterStatus>;
}

export function createHealthApi(request: RequestFn): HealthApi {
  return {
    check: () => request<HealthCheckResponse>('/health'),

    clusterStatus: () => request<ClusterStatus>('/cluster/status'),
  };
}
