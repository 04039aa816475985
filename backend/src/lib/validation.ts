import { z } from 'zod';
import type { Context } from 'hono';
import type { NodeSnapshot, PodAllocation } from '@gpuscope/shared';

/**
 * Kubernetes namespace naming rules:
 * - Must be 63 characters or less
 * - Must start and end with alphanumeric
 * - Can contain lowercase alphanumeric and hyphens
 */
export const namespaceSchema = z
  .string()
  .min(1, 'Namespace cannot be empty')
  .max(63, 'Namespace must be 63 characters or less')
  .regex(
    /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/,
    'Namespace must be lowercase alphanumeric with hyphens, starting and ending with alphanumeric'
  );

/**
 * Kubernetes resource name rules (nodes, pods):
 * - Must be 253 characters or less
 * - Must start and end with alphanumeric
 * - Can contain lowercase alphanumeric, hyphens, and dots
 */
export const resourceNameSchema = z
  .string()
  .min(1, 'Name cannot be empty')
  .max(253, 'Name must be 253 characters or less')
  .regex(
    /^[a-z0-9]([a-z0-9.-]*[a-z0-9])?$/,
    'Name must be lowercase alphanumeric with hyphens/dots, starting and ending with alphanumeric'
  );

const gpuCountSchema = z.number().int('GPU counts must be integers').min(0, 'GPU counts cannot be negative');

/**
 * A node snapshot supplied by a caller. Unlike snapshots read from the
 * cluster, these are rejected rather than clamped when out of range.
 */
export const nodeSnapshotSchema = z
  .object({
    name: resourceNameSchema,
    totalGPUs: gpuCountSchema,
    allocatedGPUs: gpuCountSchema,
    utilizationPercent: z
      .number()
      .min(0, 'utilizationPercent must be between 0 and 100')
      .max(100, 'utilizationPercent must be between 0 and 100'),
  })
  .refine((node) => node.allocatedGPUs <= node.totalGPUs, {
    message: 'allocatedGPUs cannot exceed totalGPUs',
    path: ['allocatedGPUs'],
  }) satisfies z.ZodType<NodeSnapshot>;

export const podAllocationSchema = z.object({
  podName: resourceNameSchema,
  namespace: namespaceSchema,
  allocatedGPUs: gpuCountSchema,
}) satisfies z.ZodType<PodAllocation>;

const nodeListSchema = z
  .array(nodeSnapshotSchema)
  .max(10000, 'At most 10000 nodes per request')
  .superRefine((nodes, ctx) => {
    const seen = new Set<string>();
    nodes.forEach((node, index) => {
      if (seen.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate node name: ${node.name}`,
          path: [index, 'name'],
        });
      }
      seen.add(node.name);
    });
  });

export const fragmentationRequestSchema = z.object({
  nodes: nodeListSchema,
  podsByNode: z.record(z.string(), z.array(podAllocationSchema)).default({}),
});

export const nodeAnalysisRequestSchema = z.object({
  node: nodeSnapshotSchema,
  pods: z.array(podAllocationSchema).default([]),
});

export const loadBalanceRequestSchema = z.object({
  nodes: nodeListSchema,
});

export const nodeParamsSchema = z.object({
  name: resourceNameSchema,
});

const TARGET_LABELS: Record<string, string> = {
  json: 'request body',
  query: 'query parameters',
  param: 'path parameters',
};

/**
 * Format a zod error as `path: message, path: message`
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

/**
 * zValidator hook that answers validation failures in the API's error shape
 */
export function validationHook(
  result: { success: boolean; error?: z.ZodError; target: string },
  c: Context
) {
  if (!result.success && result.error) {
    const label = TARGET_LABELS[result.target] ?? result.target;
    return c.json(
      {
        error: {
          message: `Invalid ${label}: ${formatZodError(result.error)}`,
          statusCode: 400,
        },
      },
      400
    );
  }
}

export type FragmentationRequest = z.infer<typeof fragmentationRequestSchema>;
export type NodeAnalysisRequest = z.infer<typeof nodeAnalysisRequestSchema>;
export type LoadBalanceRequest = z.infer<typeof loadBalanceRequestSchema>;
