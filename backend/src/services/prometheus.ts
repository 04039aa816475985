import { z } from 'zod';
import { withRetry } from '../lib/retry';
import { componentLogger } from '../lib/logger';

const log = componentLogger('prometheus');

const DEFAULT_QUERY = 'avg by (Hostname) (DCGM_FI_DEV_GPU_UTIL)';
const DEFAULT_NODE_LABEL = 'Hostname';
const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Per-node average GPU utilization, 0-100, keyed by node name
 */
export interface GpuUtilizationSource {
  getUtilization(): Promise<Map<string, number>>;
}

export interface PrometheusUtilizationOptions {
  /** Prometheus base URL; without one every node reads as 0% */
  baseUrl?: string;
  query?: string;
  /** Series label holding the Kubernetes node name */
  nodeLabel?: string;
  timeoutMs?: number;
  maxRetries?: number;
  fetchImpl?: typeof fetch;
}

const instantVectorSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    resultType: z.literal('vector'),
    result: z.array(
      z.object({
        metric: z.record(z.string()),
        value: z.tuple([z.number(), z.string()]),
      })
    ),
  }),
});

export type InstantVectorResponse = z.infer<typeof instantVectorSchema>;

export class PrometheusQueryError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'PrometheusQueryError';
  }
}

/**
 * Map an instant-vector result to node -> utilization. Series without the
 * node label or with a non-numeric sample are skipped.
 */
export function parseUtilizationVector(body: unknown, nodeLabel: string = DEFAULT_NODE_LABEL): Map<string, number> {
  const parsed = instantVectorSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected Prometheus response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const utilization = new Map<string, number>();
  for (const series of parsed.data.data.result) {
    const nodeName = series.metric[nodeLabel];
    const value = Number.parseFloat(series.value[1]);
    if (!nodeName || !Number.isFinite(value)) {
      continue;
    }
    utilization.set(nodeName, value);
  }
  return utilization;
}

/**
 * GPU utilization from DCGM exporter metrics in Prometheus
 */
export class PrometheusUtilizationSource implements GpuUtilizationSource {
  private baseUrl?: string;
  private query: string;
  private nodeLabel: string;
  private timeoutMs: number;
  private maxRetries: number;
  private fetchImpl: typeof fetch;

  constructor(options: PrometheusUtilizationOptions = {}) {
    this.baseUrl = options.baseUrl?.replace(/\/+$/, '');
    this.query = options.query ?? DEFAULT_QUERY;
    this.nodeLabel = options.nodeLabel ?? DEFAULT_NODE_LABEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? 2;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Current utilization per node. Empty when Prometheus is not configured
   * or cannot be read.
   */
  async getUtilization(): Promise<Map<string, number>> {
    const baseUrl = this.baseUrl;
    if (!baseUrl) {
      return new Map();
    }

    const url = `${baseUrl}/api/v1/query?query=${encodeURIComponent(this.query)}`;
    log.debug({ url }, 'Querying GPU utilization');

    try {
      const body = await withRetry(
        async () => {
          const controller = new AbortController();
          const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

          try {
            const res = await this.fetchImpl(url, {
              headers: { Accept: 'application/json' },
              signal: controller.signal,
            });
            if (!res.ok) {
              throw new PrometheusQueryError(res.status, `Prometheus returned ${res.status}: ${res.statusText}`);
            }
            const data: unknown = await res.json();
            return data;
          } finally {
            clearTimeout(timeoutId);
          }
        },
        {
          operationName: 'prometheus:getUtilization',
          maxRetries: this.maxRetries,
          initialDelayMs: 500,
          maxDelayMs: 3000,
        }
      );

      return parseUtilizationVector(body, this.nodeLabel);
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error), url: baseUrl },
        'Failed to read GPU utilization, reporting 0%'
      );
      return new Map();
    }
  }
}
