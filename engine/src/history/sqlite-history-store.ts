/**
 * SQLite-backed history store.
 * Appends go through a transaction; aggregates are read back with prepared statements.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  ProblemCategory,
  type HistoryOutcome,
  type HistoryRecord,
  type HistoryStatistics,
  type OutcomeCounts,
} from '@repairgate/shared-types';
import { createLogger } from '../logging/log';
import { AggregatingHistoryStore, type HistoryStoreOptions } from './history-store';

const log = createLogger('history');

const OutcomeRowSchema = z.object({
  outcome: z.enum(['success', 'failure']),
});

const CountRowSchema = z.object({
  key: z.string(),
  total: z.number(),
  successes: z.number().nullable(),
});

function toCounts(total: number, successes: number | null): OutcomeCounts {
  const wins = successes ?? 0;
  return { total, successes: wins, successRate: total > 0 ? wins / total : 0 };
}

export class SqliteHistoryStore extends AggregatingHistoryStore {
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement;
  private readonly recentStatement: Database.Statement;
  private readonly appendTransaction: (event: HistoryRecord) => void;

  /**
   * @param dbPath file path, or ':memory:'
   */
  constructor(dbPath: string, options: HistoryStoreOptions) {
    super(options);

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);

    // Enable WAL mode for concurrent readers alongside the writer
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS repair_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        category TEXT NOT NULL,
        model TEXT NOT NULL,
        outcome TEXT NOT NULL CHECK (outcome IN ('success', 'failure')),
        timestamp INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_repair_history_category ON repair_history(category, id);
    `);

    this.insertStatement = this.db.prepare(
      `INSERT INTO repair_history (category, model, outcome, timestamp) VALUES (?, ?, ?, ?)`
    );
    this.recentStatement = this.db.prepare(
      `SELECT outcome FROM repair_history WHERE category = ? ORDER BY id DESC LIMIT ?`
    );
    this.appendTransaction = this.db.transaction((event: HistoryRecord) => {
      this.insertStatement.run(event.problemCategory, event.modelUsed, event.outcome, event.timestamp);
    });

    log.debug('History store opened', { dbPath });
  }

  protected append(event: HistoryRecord): void {
    this.appendTransaction(event);
  }

  protected recentOutcomes(category: ProblemCategory, limit: number): HistoryOutcome[] {
    return this.recentStatement
      .all(category, limit)
      .map(row => OutcomeRowSchema.parse(row).outcome);
  }

  private groupCounts(column: 'category' | 'model'): Array<z.infer<typeof CountRowSchema>> {
    return this.db
      .prepare(
        `SELECT ${column} AS key, COUNT(*) AS total,
                SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END) AS successes
           FROM repair_history GROUP BY ${column}`
      )
      .all()
      .map(row => CountRowSchema.parse(row));
  }

  async statistics(): Promise<HistoryStatistics> {
    const byCategory: HistoryStatistics['byCategory'] = {};
    const byModel: HistoryStatistics['byModel'] = {};
    let total = 0;
    let successes = 0;

    for (const row of this.groupCounts('category')) {
      const category = z.nativeEnum(ProblemCategory).safeParse(row.key);
      if (!category.success) {
        log.warn('Skipping unknown category in history', { category: row.key });
        continue;
      }
      byCategory[category.data] = toCounts(row.total, row.successes);
      total += row.total;
      successes += row.successes ?? 0;
    }
    for (const row of this.groupCounts('model')) {
      byModel[row.key] = toCounts(row.total, row.successes);
    }

    return { ...toCounts(total, successes), byCategory, byModel };
  }

  close(): void {
    this.db.close();
  }
}
