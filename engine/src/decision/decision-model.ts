/**
 * Decision Model - repair vs. rebuild
 *
 *   repair_cost         = gamma * D * (1/S) * (1/K) * (1 + lambda * (1 - T))
 *   success_probability = sigmoid(alpha*K + beta*T + gamma'*S - delta*min(D/100, 1))
 *
 * REBUILD iff repair_cost > threshold * rebuild_cost; equality stays REPAIR.
 * Pure and deterministic: no I/O, no clock, no randomness.
 */

import type { DecisionResult, RepairDecision, RepairMetrics } from '@repairgate/shared-types';

export interface DecisionOptions {
  rebuildThreshold: number;
  minSuccessProbability: number;
  /** A REPAIR at or above band * threshold of the rebuild cost is borderline */
  borderlineBand: number;
  /** Lower bound for S and K denominators, and for the repair cost itself */
  epsilon: number;
}

export const DEFAULT_DECISION_OPTIONS: DecisionOptions = {
  rebuildThreshold: 1.5,
  minSuccessProbability: 0.3,
  borderlineBand: 0.8,
  epsilon: 1e-6,
};

export function sigmoid(x: number): number {
  if (x >= 0) {
    return 1 / (1 + Math.exp(-x));
  }
  const e = Math.exp(x);
  return e / (1 + e);
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

export function computeRepairCost(
  metrics: RepairMetrics,
  epsilon: number
): { repairCost: number; clamped: boolean } {
  const { gamma, lambda } = metrics.weights;
  const debt = Math.max(0, finiteOr(metrics.technicalDebt, 0));
  const coverage = finiteOr(metrics.testCoverage, 0);
  const capability = Math.max(finiteOr(metrics.modelCapability, 0), epsilon);
  const context = Math.max(finiteOr(metrics.availableContext, 0), epsilon);
  const clamped = capability === epsilon || context === epsilon;

  const raw = gamma * debt * (1 / capability) * (1 / context) * (1 + lambda * (1 - coverage));
  return { repairCost: Math.max(finiteOr(raw, epsilon), epsilon), clamped };
}

export function computeSuccessProbability(metrics: RepairMetrics): number {
  const { alpha, beta, gammaPrime, delta } = metrics.weights;
  const debtNorm = Math.min(Math.max(0, finiteOr(metrics.technicalDebt, 0)) / 100, 1);
  const x =
    alpha * finiteOr(metrics.availableContext, 0) +
    beta * finiteOr(metrics.testCoverage, 0) +
    gammaPrime * finiteOr(metrics.modelCapability, 0) -
    delta * debtNorm;
  return sigmoid(finiteOr(x, 0));
}

function riskFactors(metrics: RepairMetrics, successProbability: number, options: DecisionOptions): string[] {
  const risks: string[] = [];
  if (metrics.technicalDebt > 70) {
    risks.push(`High technical debt (${metrics.technicalDebt.toFixed(1)}/100)`);
  }
  if (metrics.testCoverage < 0.3) {
    risks.push(`Low test coverage (${(metrics.testCoverage * 100).toFixed(0)}%)`);
  }
  if (metrics.availableContext < 0.4) {
    risks.push(`Limited diagnostic context (${(metrics.availableContext * 100).toFixed(0)}%)`);
  }
  if (metrics.modelCapability < 0.5) {
    risks.push(`Weak model capability for this task (${metrics.modelCapability.toFixed(2)})`);
  }
  if (successProbability < options.minSuccessProbability) {
    risks.push(`Success probability below ${(options.minSuccessProbability * 100).toFixed(0)}%`);
  }
  return risks;
}

/**
 * Decide between REPAIR and REBUILD. `rebuildCost` must be positive and finite.
 */
export function decide(
  metrics: RepairMetrics,
  rebuildCost: number,
  options: DecisionOptions = DEFAULT_DECISION_OPTIONS
): DecisionResult {
  if (!(Number.isFinite(rebuildCost) && rebuildCost > 0)) {
    throw new RangeError(`rebuildCost must be a positive finite number, got ${rebuildCost}`);
  }

  const { repairCost, clamped } = computeRepairCost(metrics, options.epsilon);
  const successProbability = computeSuccessProbability(metrics);
  const threshold = options.rebuildThreshold;
  const decision: RepairDecision = repairCost > threshold * rebuildCost ? 'REBUILD' : 'REPAIR';
  const costRatio = repairCost / rebuildCost;

  const borderline =
    decision === 'REPAIR'
      ? costRatio >= options.borderlineBand * threshold ||
        successProbability < options.minSuccessProbability
      : costRatio <= threshold / options.borderlineBand;
  const lowConfidence = clamped || metrics.lowConfidence;

  const reasoning = [
    `Repair cost ${repairCost.toFixed(2)} vs rebuild cost ${rebuildCost.toFixed(2)} ` +
      `(ratio ${costRatio.toFixed(2)}, rebuild above ${threshold})`,
    `Estimated repair success probability ${(successProbability * 100).toFixed(1)}%`,
    decision === 'REBUILD'
      ? 'Repair cost exceeds the rebuild threshold; rebuilding is expected to be cheaper'
      : 'Repair cost is within the rebuild threshold; attempting a bounded repair',
  ];
  if (borderline) {
    reasoning.push('Decision is borderline');
  }
  if (clamped) {
    reasoning.push('Capability or context was near zero and was clamped; estimate is low-confidence');
  }

  const risks = riskFactors(metrics, successProbability, options);
  if (borderline) {
    risks.push('Cost ratio is close to the rebuild threshold or success is unlikely');
  }

  return {
    repairCost,
    rebuildCost,
    successProbability,
    decision,
    costRatio,
    rebuildThreshold: threshold,
    borderline,
    lowConfidence,
    reasoning,
    riskFactors: risks,
    weights: { ...metrics.weights },
  };
}

/**
 * Hints for improving the odds of a repair
 */
export function optimizationSuggestions(metrics: RepairMetrics): string[] {
  const suggestions: string[] = [];
  if (metrics.testCoverage < 0.5) {
    suggestions.push('Add tests around the failing code to improve coverage');
  }
  if (metrics.availableContext < 0.6) {
    suggestions.push('Provide more context: a failing test, a dependency manifest or documentation');
  }
  if (metrics.technicalDebt > 60) {
    suggestions.push('Reduce technical debt (branching, duplication, undocumented APIs) before repairing');
  }
  if (metrics.modelCapability < 0.6) {
    suggestions.push('Use a more capable generation model');
  }
  return suggestions;
}
