import * as k8s from '@kubernetes/client-node';
import type { AnalysisThresholds, AnalysisThresholdsOverride } from '@gpuscope/shared';
import { getErrorStatusCode } from '../lib/retry';
import { componentLogger } from '../lib/logger';
import { mergeOverrides, resolveThresholds, thresholdsOverrideSchema } from './thresholds';

const log = componentLogger('config');

export const DEFAULT_CONFIG_NAMESPACE = 'gpuscope';
const CONFIG_NAME = 'gpuscope-config';
const CONFIG_KEY = 'config.json';

const MANAGED_LABELS = {
  'app.kubernetes.io/name': 'gpuscope',
  'app.kubernetes.io/managed-by': 'gpuscope',
};

/**
 * Persistence for the serialized threshold overrides
 */
export interface ConfigStore {
  /** Stored document, or null when nothing has been saved yet */
  load(): Promise<string | null>;
  save(data: string): Promise<void>;
}

/**
 * ConfigStore backed by a ConfigMap in the given namespace
 */
export class ConfigMapStore implements ConfigStore {
  private coreV1Api: k8s.CoreV1Api;

  constructor(
    private namespace: string = DEFAULT_CONFIG_NAMESPACE,
    kc?: k8s.KubeConfig
  ) {
    let config = kc;
    if (!config) {
      config = new k8s.KubeConfig();
      try {
        config.loadFromDefault();
      } catch {
        log.warn('No kubeconfig found for ConfigMapStore');
      }
    }
    this.coreV1Api = config.makeApiClient(k8s.CoreV1Api);
  }

  async load(): Promise<string | null> {
    try {
      const response = await this.coreV1Api.readNamespacedConfigMap(CONFIG_NAME, this.namespace);
      return response.body.data?.[CONFIG_KEY] ?? null;
    } catch (error) {
      if (getErrorStatusCode(error) !== 404) {
        throw error;
      }
      log.debug('ConfigMap not found, using default thresholds');
      return null;
    }
  }

  async save(data: string): Promise<void> {
    await this.ensureNamespace();

    const configMapBody: k8s.V1ConfigMap = {
      metadata: {
        name: CONFIG_NAME,
        namespace: this.namespace,
        labels: MANAGED_LABELS,
      },
      data: {
        [CONFIG_KEY]: data,
      },
    };

    try {
      await this.coreV1Api.replaceNamespacedConfigMap(CONFIG_NAME, this.namespace, configMapBody);
    } catch (error) {
      if (getErrorStatusCode(error) !== 404) {
        throw error;
      }
      await this.coreV1Api.createNamespacedConfigMap(this.namespace, configMapBody);
    }
  }

  private async ensureNamespace(): Promise<void> {
    try {
      await this.coreV1Api.readNamespace(this.namespace);
    } catch (error) {
      if (getErrorStatusCode(error) !== 404) {
        throw error;
      }
      await this.coreV1Api.createNamespace({
        metadata: { name: this.namespace, labels: MANAGED_LABELS },
      });
      log.info({ namespace: this.namespace }, `Created namespace '${this.namespace}'`);
    }
  }
}

export class MemoryConfigStore implements ConfigStore {
  constructor(private data: string | null = null) {}

  async load(): Promise<string | null> {
    return this.data;
  }

  async save(data: string): Promise<void> {
    this.data = data;
  }
}

/**
 * Analysis thresholds with persisted per-cluster overrides
 */
export class ConfigService {
  private cachedOverrides: AnalysisThresholdsOverride | null = null;

  constructor(private store: ConfigStore) {}

  /**
   * Stored overrides. A document that no longer parses or validates is
   * ignored so the service falls back to the defaults. A store that cannot
   * be read is an error, and nothing is cached.
   */
  async getOverrides(): Promise<AnalysisThresholdsOverride> {
    if (this.cachedOverrides) {
      return this.cachedOverrides;
    }

    let raw: string | null;
    try {
      raw = await this.store.load();
    } catch (error) {
      log.error({ error }, 'Error loading configuration');
      throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
    let overrides: AnalysisThresholdsOverride = {};

    if (raw) {
      try {
        const parsed = thresholdsOverrideSchema.safeParse(JSON.parse(raw));
        if (parsed.success) {
          resolveThresholds(parsed.data);
          overrides = parsed.data;
        } else {
          log.warn({ issues: parsed.error.issues }, 'Stored thresholds are invalid, using defaults');
        }
      } catch (error) {
        log.warn({ error }, 'Stored thresholds are unusable, using defaults');
      }
    }

    this.cachedOverrides = overrides;
    return overrides;
  }

  /**
   * Effective thresholds for an analysis. If the store cannot be read the
   * defaults apply to this call only.
   */
  async getThresholds(): Promise<AnalysisThresholds> {
    let overrides: AnalysisThresholdsOverride = {};
    try {
      overrides = await this.getOverrides();
    } catch (error) {
      log.warn({ error }, 'Using default thresholds');
    }
    return resolveThresholds(overrides);
  }

  /**
   * Merge `update` into the stored overrides and persist the result.
   * Throws InvalidThresholdsError if the combined thresholds are inconsistent.
   */
  async updateOverrides(update: AnalysisThresholdsOverride): Promise<AnalysisThresholds> {
    const merged = mergeOverrides(await this.getOverrides(), update);
    const thresholds = resolveThresholds(merged);

    await this.persist(merged);
    return thresholds;
  }

  /**
   * Drop every override
   */
  async reset(): Promise<AnalysisThresholds> {
    await this.persist({});
    return resolveThresholds();
  }

  clearCache(): void {
    this.cachedOverrides = null;
  }

  private async persist(overrides: AnalysisThresholdsOverride): Promise<void> {
    try {
      await this.store.save(JSON.stringify(overrides, null, 2));
    } catch (error) {
      log.error({ error }, 'Error saving configuration');
      throw new Error(`Failed to save configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
    this.cachedOverrides = overrides;
  }
}
