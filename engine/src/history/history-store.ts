/**
 * History Store - append-only repair outcome log with a decayed aggregate per
 * problem category. The aggregate is recomputed from the log on every read, so
 * concurrent appends are never lost to a read-modify-write race.
 */

import {
  ProblemCategory,
  type HistoryOutcome,
  type HistoryRecord,
  type HistoryStatistics,
} from '@repairgate/shared-types';
import {
  computeDecayedAggregate,
  summarizeRecords,
  type AggregateOptions,
  type DecayedAggregate,
} from './decayed-aggregate';

export interface HistoryStore {
  record(event: HistoryRecord): Promise<void>;
  /** Capability adjustment for a category; 0 below the sample threshold */
  adjustment(category: ProblemCategory): Promise<number>;
  successRate(category: ProblemCategory): Promise<DecayedAggregate>;
  statistics(): Promise<HistoryStatistics>;
  close(): void;
}

export interface HistoryStoreOptions extends AggregateOptions {
  /** Newest records per category that feed the aggregate */
  windowSize: number;
}

export class InvalidHistoryRecordError extends Error {
  readonly code = 'INVALID_HISTORY_RECORD';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidHistoryRecordError';
  }
}

const CATEGORY_SET = new Set<string>(Object.values(ProblemCategory));

export function assertValidRecord(event: HistoryRecord): void {
  if (!CATEGORY_SET.has(event.problemCategory)) {
    throw new InvalidHistoryRecordError(`Unknown problem category: ${event.problemCategory}`);
  }
  if (event.outcome !== 'success' && event.outcome !== 'failure') {
    throw new InvalidHistoryRecordError(`Unknown outcome: ${String(event.outcome)}`);
  }
  if (!event.modelUsed.trim()) {
    throw new InvalidHistoryRecordError('modelUsed must not be empty');
  }
  if (!Number.isFinite(event.timestamp)) {
    throw new InvalidHistoryRecordError('timestamp must be a finite number');
  }
}

/**
 * Shared aggregate logic; subclasses provide storage.
 */
export abstract class AggregatingHistoryStore implements HistoryStore {
  protected constructor(protected readonly options: HistoryStoreOptions) {}

  protected abstract append(event: HistoryRecord): void;

  protected abstract recentOutcomes(category: ProblemCategory, limit: number): HistoryOutcome[];

  abstract statistics(): Promise<HistoryStatistics>;

  abstract close(): void;

  async record(event: HistoryRecord): Promise<void> {
    assertValidRecord(event);
    this.append(event);
  }

  async successRate(category: ProblemCategory): Promise<DecayedAggregate> {
    return computeDecayedAggregate(this.recentOutcomes(category, this.options.windowSize), this.options);
  }

  async adjustment(category: ProblemCategory): Promise<number> {
    return (await this.successRate(category)).adjustment;
  }
}

/**
 * Process-local store, used by tests and single-shot runs.
 */
export class InMemoryHistoryStore extends AggregatingHistoryStore {
  private readonly events: HistoryRecord[] = [];

  constructor(options: HistoryStoreOptions) {
    super(options);
  }

  protected append(event: HistoryRecord): void {
    this.events.push({ ...event });
  }

  protected recentOutcomes(category: ProblemCategory, limit: number): HistoryOutcome[] {
    const outcomes: HistoryOutcome[] = [];
    for (let i = this.events.length - 1; i >= 0 && outcomes.length < limit; i--) {
      const event = this.events[i];
      if (event.problemCategory === category) {
        outcomes.push(event.outcome);
      }
    }
    return outcomes;
  }

  async statistics(): Promise<HistoryStatistics> {
    return summarizeRecords(this.events);
  }

  /** Snapshot of the log, oldest first */
  records(): HistoryRecord[] {
    return this.events.map(event => ({ ...event }));
  }

  close(): void {
    // nothing to release
  }
}
