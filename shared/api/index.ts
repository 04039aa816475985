/**
 * Typed client for the GPU Scope API
 */

export { ApiError, createRequestFn } from './client';
export type { ApiClientConfig, RequestFn } from './client';

import { createRequestFn, type ApiClientConfig } from './client';
import { createHealthApi, type HealthApi } from './health';
import { createNodesApi, type NodesApi } from './nodes';
import { createAnalysisApi, type AnalysisApi } from './analysis';
import { createSettingsApi, type SettingsApi } from './settings';

export type { HealthApi, HealthCheckResponse } from './health';
export type { NodesApi } from './nodes';
export type { AnalysisApi } from './analysis';
export type { SettingsApi } from './settings';

export interface ApiClient {
  health: HealthApi;
  nodes: NodesApi;
  analysis: AnalysisApi;
  settings: SettingsApi;
}

/**
 * Create an API client
 *
 * @example
 * ```typescript
 * const client = createApiClient({
 *   baseUrl: 'http://gpuscope.monitoring.svc:3001',
 *   getToken: () => process.env.GPUSCOPE_TOKEN ?? null,
 * });
 *
 * const { hotspotNodeNames } = await client.nodes.getLoadBalanceAnalysis();
 * ```
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  const request = createRequestFn(config);

  return {
    health: createHealthApi(request),
    nodes: createNodesApi(request),
    analysis: createAnalysisApi(request),
    settings: createSettingsApi(request),
  };
}
