import { z } from 'zod';
import { formatZodError } from './validation';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  CORS_ORIGIN: z.string().min(1).default('*'),
  PROMETHEUS_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  GPU_UTILIZATION_QUERY: z.string().min(1).default('avg by (Hostname) (DCGM_FI_DEV_GPU_UTIL)'),
  GPU_UTILIZATION_NODE_LABEL: z.string().min(1).default('Hostname'),
  GPU_RESOURCE_NAME: z.string().min(1).default('nvidia.com/gpu'),
  CONFIG_NAMESPACE: z.string().min(1).default('gpuscope'),
});

export type ServerEnv = z.infer<typeof envSchema>;

/**
 * Process settings from environment variables, with defaults for
 * everything unset
 */
export function loadServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment: ${formatZodError(result.error)}`);
  }
  return result.data;
}
