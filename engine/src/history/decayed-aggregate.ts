import type { HistoryOutcome, HistoryRecord, HistoryStatistics, OutcomeCounts } from '@repairgate/shared-types';

export interface AggregateOptions {
  /** Weight multiplier per step back in time, in (0,1) */
  decayFactor: number;
  /** Samples required before the adjustment is trusted */
  minSamples: number;
  /** Scale of (successRate - 0.5) */
  weight: number;
}

export interface DecayedAggregate {
  samples: number;
  /** Decay-weighted success rate; 0.5 when there are no samples */
  successRate: number;
  /** weight * (successRate - 0.5), or 0 below minSamples */
  adjustment: number;
}

/**
 * Decay-weighted success rate over outcomes ordered newest first:
 * the newest sample has weight 1, the i-th older one decayFactor^i.
 */
export function computeDecayedAggregate(
  outcomesNewestFirst: readonly HistoryOutcome[],
  options: AggregateOptions
): DecayedAggregate {
  const samples = outcomesNewestFirst.length;
  if (samples === 0) {
    return { samples: 0, successRate: 0.5, adjustment: 0 };
  }

  let weighted = 0;
  let totalWeight = 0;
  let weight = 1;
  for (const outcome of outcomesNewestFirst) {
    weighted += outcome === 'success' ? weight : 0;
    totalWeight += weight;
    weight *= options.decayFactor;
  }

  const successRate = totalWeight > 0 ? weighted / totalWeight : 0.5;
  const adjustment = samples < options.minSamples ? 0 : options.weight * (successRate - 0.5);

  return { samples, successRate, adjustment };
}

function countOutcomes(records: readonly HistoryRecord[]): OutcomeCounts {
  const successes = records.filter(record => record.outcome === 'success').length;
  return {
    total: records.length,
    successes,
    successRate: records.length > 0 ? successes / records.length : 0,
  };
}

export function summarizeRecords(records: readonly HistoryRecord[]): HistoryStatistics {
  const byCategory: HistoryStatistics['byCategory'] = {};
  const byModel: HistoryStatistics['byModel'] = {};

  const categories = new Set(records.map(record => record.problemCategory));
  for (const category of categories) {
    byCategory[category] = countOutcomes(records.filter(r => r.problemCategory === category));
  }
  const models = new Set(records.map(record => record.modelUsed));
  for (const model of models) {
    byModel[model] = countOutcomes(records.filter(r => r.modelUsed === model));
  }

  return { ...countOutcomes(records), byCategory, byModel };
}
