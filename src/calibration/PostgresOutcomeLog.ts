import type { OutcomeLog, OutcomeRecord } from './types.js';
import type { PostgresConnectionManager } from '../storage/postgres/PostgresConnectionManager.js';
import { toStorageFault } from '../storage/AnalysisStore.js';

interface OutcomeRow {
  predicted_confidence: number;
  was_correct: boolean;
  timestamp: string;
}

/**
 * Outcome log in the analysis store's PostgreSQL database
 */
export class PostgresOutcomeLog implements OutcomeLog {
  constructor(private readonly connection: PostgresConnectionManager) {}

  async init(): Promise<void> {
    try {
      await this.connection.query(`
        CREATE TABLE IF NOT EXISTS calibration_outcomes (
          seq BIGSERIAL PRIMARY KEY,
          predicted_confidence DOUBLE PRECISION NOT NULL,
          was_correct BOOLEAN NOT NULL,
          timestamp BIGINT NOT NULL
        )
      `);
    } catch (error) {
      throw toStorageFault('initOutcomeLog', error);
    }
  }

  async append(outcome: OutcomeRecord): Promise<void> {
    try {
      await this.connection.query(
        `INSERT INTO calibration_outcomes (predicted_confidence, was_correct, timestamp) VALUES ($1, $2, $3)`,
        [outcome.predictedConfidence, outcome.wasCorrect, outcome.timestamp]
      );
    } catch (error) {
      throw toStorageFault('appendOutcome', error);
    }
  }

  async readAll(): Promise<OutcomeRecord[]> {
    try {
      const result = await this.connection.query<OutcomeRow>(
        `SELECT predicted_confidence, was_correct, timestamp FROM calibration_outcomes ORDER BY seq ASC`
      );
      // BIGINT arrives as a string
      return result.rows.map(row => ({
        predictedConfidence: row.predicted_confidence,
        wasCorrect: row.was_correct,
        timestamp: Number(row.timestamp),
      }));
    } catch (error) {
      throw toStorageFault('readOutcomes', error);
    }
  }
}
