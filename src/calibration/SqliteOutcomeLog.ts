import type Database from 'better-sqlite3';
import type { OutcomeLog, OutcomeRecord } from './types.js';
import { toStorageFault } from '../storage/AnalysisStore.js';

interface OutcomeRow {
  predicted_confidence: number;
  was_correct: number;
  timestamp: number;
}

/**
 * Outcome log kept in its own table, usually in the analysis store's database file
 */
export class SqliteOutcomeLog implements OutcomeLog {
  constructor(private readonly db: Database.Database) {}

  async init(): Promise<void> {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS calibration_outcomes (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          predicted_confidence REAL NOT NULL,
          was_correct INTEGER NOT NULL,
          timestamp INTEGER NOT NULL
        )
      `);
    } catch (error) {
      throw toStorageFault('initOutcomeLog', error);
    }
  }

  async append(outcome: OutcomeRecord): Promise<void> {
    try {
      this.db
        .prepare(
          `INSERT INTO calibration_outcomes (predicted_confidence, was_correct, timestamp) VALUES (?, ?, ?)`
        )
        .run(outcome.predictedConfidence, outcome.wasCorrect ? 1 : 0, outcome.timestamp);
    } catch (error) {
      throw toStorageFault('appendOutcome', error);
    }
  }

  async readAll(): Promise<OutcomeRecord[]> {
    try {
      const rows = this.db
        .prepare<[], OutcomeRow>(
          `SELECT predicted_confidence, was_correct, timestamp FROM calibration_outcomes ORDER BY seq ASC`
        )
        .all();
      return rows.map(row => ({
        predictedConfidence: row.predicted_confidence,
        wasCorrect: row.was_correct === 1,
        timestamp: row.timestamp,
      }));
    } catch (error) {
      throw toStorageFault('readOutcomes', error);
    }
  }
}
