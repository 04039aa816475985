/**
 * Settings API
 */

import type { RequestFn } from './client';
import type {
  AnalysisThresholdsOverride,
  SettingsResponse,
  UpdateSettingsResponse,
} from '../types';

export interface SettingsApi {
  /** Get effective thresholds and stored overrides */
  get: () => Promise<SettingsResponse>;

  /** Merge threshold overrides into the stored ones */
  update: (overrides: AnalysisThresholdsOverride) => Promise<UpdateSettingsResponse>;

  /** Drop all overrides */
  reset: () => Promise<UpdateSettingsResponse>;
}

export function createSettingsApi(request: RequestFn): SettingsApi {
  return {
    get: () => request<SettingsResponse>('/settings'),

    update: (overrides: AnalysisThresholdsOverride) =>
      request<UpdateSettingsResponse>('/settings', {
        method: 'PUT',
        body: JSON.stringify(overrides),
      }),

    reset: () =>
      request<UpdateSettingsResponse>('/settings/reset', {
        method: 'POST',
      }),
  };
}
