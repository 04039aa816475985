import { serve } from '@hono/node-server';
import { createApp } from './hono-app';
import { loadServerEnv } from './lib/env';
import logger from './lib/logger';
import { ConfigMapStore, ConfigService } from './services/config';
import { KubernetesSnapshotProvider } from './services/kubernetes';
import { PrometheusUtilizationSource } from './services/prometheus';

const env = loadServerEnv();

if (!env.PROMETHEUS_URL) {
  logger.warn('PROMETHEUS_URL is not set, GPU utilization will be reported as 0%');
}

const snapshots = new KubernetesSnapshotProvider({
  resourceName: env.GPU_RESOURCE_NAME,
  utilization: new PrometheusUtilizationSource({
    baseUrl: env.PROMETHEUS_URL,
    query: env.GPU_UTILIZATION_QUERY,
    nodeLabel: env.GPU_UTILIZATION_NODE_LABEL,
  }),
});

const config = new ConfigService(new ConfigMapStore(env.CONFIG_NAMESPACE));

const app = createApp({ snapshots, config }, { corsOrigin: env.CORS_ORIGIN });

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info({ port: info.port }, `GPU Scope backend running on http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
