import { z } from 'zod';
import type { AnalysisThresholds, AnalysisThresholdsOverride } from '@gpuscope/shared';

/**
 * Default analysis thresholds
 */
export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  fragmentation: {
    healthyBelow: 30,
    criticalFrom: 60,
    weights: {
      unusedCapacity: 40,
      idleAllocation: 40,
      partialAllocation: 20,
    },
    largeAllocationGpus: 4,
    largeNodeGpus: 8,
    smallPodsOnLargeNode: 2,
    largeNodePenalty: 0.3,
    smallPodsOnAnyNode: 4,
    anyNodePenalty: 0.4,
    lowUtilizationPercent: 30,
    consolidatePartialPods: 3,
    minSchedulableBlock: 4,
  },
  loadBalance: {
    allocationWeight: 0.6,
    utilizationWeight: 0.4,
    hotspotBand: 20,
    highStddev: 20,
    lowMeanAllocation: 40,
  },
};

const nonNegative = z.number().finite().min(0);
const count = z.number().int().min(0);
const percent = z.number().min(0).max(100);
const penalty = z.number().min(0).max(1);

const fragmentationOverrideSchema = z
  .object({
    healthyBelow: percent,
    criticalFrom: percent,
    weights: z
      .object({
        unusedCapacity: nonNegative,
        idleAllocation: nonNegative,
        partialAllocation: nonNegative,
      })
      .partial()
      .strict(),
    largeAllocationGpus: count.min(1),
    largeNodeGpus: count.min(1),
    smallPodsOnLargeNode: count,
    largeNodePenalty: penalty,
    smallPodsOnAnyNode: count,
    anyNodePenalty: penalty,
    lowUtilizationPercent: percent,
    consolidatePartialPods: count,
    minSchedulableBlock: count.min(1),
  })
  .partial()
  .strict();

const loadBalanceOverrideSchema = z
  .object({
    allocationWeight: nonNegative,
    utilizationWeight: nonNegative,
    hotspotBand: nonNegative,
    highStddev: nonNegative,
    lowMeanAllocation: percent,
  })
  .partial()
  .strict();

/**
 * Shape of a threshold override. Cross-field rules are checked on the
 * merged result by `resolveThresholds`.
 */
export const thresholdsOverrideSchema = z
  .object({
    fragmentation: fragmentationOverrideSchema,
    loadBalance: loadBalanceOverrideSchema,
  })
  .partial()
  .strict() satisfies z.ZodType<AnalysisThresholdsOverride>;

export class InvalidThresholdsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidThresholdsError';
  }
}

/**
 * Deep-merge two overrides, `next` winning per field
 */
export function mergeOverrides(
  base: AnalysisThresholdsOverride,
  next: AnalysisThresholdsOverride
): AnalysisThresholdsOverride {
  const merged: AnalysisThresholdsOverride = {};

  if (base.fragmentation || next.fragmentation) {
    const weights = { ...base.fragmentation?.weights, ...next.fragmentation?.weights };
    merged.fragmentation = { ...base.fragmentation, ...next.fragmentation };
    if (Object.keys(weights).length > 0) {
      merged.fragmentation.weights = weights;
    }
  }

  if (base.loadBalance || next.loadBalance) {
    merged.loadBalance = { ...base.loadBalance, ...next.loadBalance };
  }

  return merged;
}

/**
 * Apply an override to the defaults and check the combined values
 */
export function resolveThresholds(
  override: AnalysisThresholdsOverride = {},
  defaults: AnalysisThresholds = DEFAULT_THRESHOLDS
): AnalysisThresholds {
  const thresholds: AnalysisThresholds = {
    fragmentation: {
      ...defaults.fragmentation,
      ...override.fragmentation,
      weights: {
        ...defaults.fragmentation.weights,
        ...override.fragmentation?.weights,
      },
    },
    loadBalance: {
      ...defaults.loadBalance,
      ...override.loadBalance,
    },
  };

  const { healthyBelow, criticalFrom } = thresholds.fragmentation;
  if (healthyBelow >= criticalFrom) {
    throw new InvalidThresholdsError(
      `fragmentation.healthyBelow (${healthyBelow}) must be lower than fragmentation.criticalFrom (${criticalFrom})`
    );
  }

  const { allocationWeight, utilizationWeight } = thresholds.loadBalance;
  if (allocationWeight + utilizationWeight <= 0) {
    throw new InvalidThresholdsError('loadBalance weights cannot both be zero');
  }

  return thresholds;
}
