/**
 * Rebuild cost estimation. The decision model only requires the estimate to be
 * positive; estimators are pluggable.
 */

import { errorMessage, type RepairMetrics } from '@repairgate/shared-types';
import { createLogger } from '../logging/log';

const log = createLogger('rebuild-estimator');

export interface RebuildEstimateInput {
  sourceRoot: string;
  metrics: RepairMetrics;
}

export interface RebuildEstimator {
  estimate(input: RebuildEstimateInput): number | Promise<number>;
}

export interface ScopeRebuildEstimatorOptions {
  baselineCost: number;
  complexityMultiplier: number;
}

/**
 * baselineCost * max(1, source file count) * complexityMultiplier
 */
export class ScopeRebuildEstimator implements RebuildEstimator {
  constructor(private readonly options: ScopeRebuildEstimatorOptions) {}

  estimate(input: RebuildEstimateInput): number {
    const files = Math.max(1, input.metrics.breakdown.sourceFileCount);
    return this.options.baselineCost * files * this.options.complexityMultiplier;
  }
}

/**
 * Run an estimator, substituting `fallbackCost` when it throws or returns a
 * non-positive or non-finite value.
 */
export async function estimateRebuildCost(
  estimator: RebuildEstimator,
  input: RebuildEstimateInput,
  fallbackCost: number
): Promise<{ cost: number; diagnostics: string[] }> {
  try {
    const cost = await estimator.estimate(input);
    if (Number.isFinite(cost) && cost > 0) {
      return { cost, diagnostics: [] };
    }
    log.warn('Rebuild estimator returned an invalid cost, using fallback', { cost, fallbackCost });
    return { cost: fallbackCost, diagnostics: ['rebuild_estimate_invalid'] };
  } catch (error) {
    log.warn('Rebuild estimator failed, using fallback', { error: errorMessage(error), fallbackCost });
    return { cost: fallbackCost, diagnostics: ['rebuild_estimate_failed'] };
  }
}
