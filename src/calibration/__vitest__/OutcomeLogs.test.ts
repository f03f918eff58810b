import { describe, it, expect, vi, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteOutcomeLog } from '../SqliteOutcomeLog.js';
import { PostgresOutcomeLog } from '../PostgresOutcomeLog.js';
import { InMemoryOutcomeLog } from '../InMemoryOutcomeLog.js';
import { CalibrationService } from '../CalibrationService.js';
import { PostgresConnectionManager } from '../../storage/postgres/PostgresConnectionManager.js';
import { DEFAULT_POSTGRES_CONFIG } from '../../storage/postgres/PostgresConfig.js';
import { StorageFaultError } from '../../storage/AnalysisStore.js';

const mocks = vi.hoisted(() => {
  const pool = { query: vi.fn(), on: vi.fn(), end: vi.fn(async () => {}) };
  const Pool = vi.fn(function () {
    return pool;
  });
  return { pool, Pool };
});

vi.mock('pg', () => ({ default: { Pool: mocks.Pool } }));

describe('SqliteOutcomeLog', () => {
  it('keeps outcomes in insertion order across instances', async () => {
    const db = new Database(':memory:');
    const log = new SqliteOutcomeLog(db);
    await log.init();
    await log.append({ predictedConfidence: 0.9, wasCorrect: false, timestamp: 100 });
    await log.append({ predictedConfidence: 0.4, wasCorrect: true, timestamp: 200 });

    const reopened = new SqliteOutcomeLog(db);
    await reopened.init();

    await expect(reopened.readAll()).resolves.toEqual([
      { predictedConfidence: 0.9, wasCorrect: false, timestamp: 100 },
      { predictedConfidence: 0.4, wasCorrect: true, timestamp: 200 },
    ]);
    db.close();
  });

  it('rebuilds calibration state after a restart', async () => {
    const db = new Database(':memory:');
    const first = new CalibrationService(new SqliteOutcomeLog(db));
    await first.load();
    await first.recordOutcome(0.72, true, 10);
    await first.recordOutcome(0.68, false, 20);

    const second = new CalibrationService(new SqliteOutcomeLog(db));
    await second.load();

    expect(second.getBin(70)).toEqual({ level: 70, total: 2, correct: 1 });
    expect(second.getSnapshots()).toEqual([
      { timestamp: 10, accuracy: 1 },
      { timestamp: 20, accuracy: 0.5 },
    ]);
    db.close();
  });

  it('wraps driver errors as storage faults', async () => {
    const db = new Database(':memory:');
    const log = new SqliteOutcomeLog(db);
    await log.init();
    db.close();

    await expect(log.append({ predictedConfidence: 0.5, wasCorrect: true, timestamp: 1 })).rejects.toBeInstanceOf(
      StorageFaultError
    );
  });
});

describe('PostgresOutcomeLog', () => {
  beforeEach(() => {
    mocks.pool.query.mockReset();
  });

  it('writes parameterized rows and converts BIGINT timestamps', async () => {
    mocks.pool.query.mockImplementation(async (text: string) => {
      if (text.startsWith('SELECT')) {
        return { rows: [{ predicted_confidence: 0.8, was_correct: true, timestamp: '1700000000000' }], rowCount: 1 };
      }
      return { rows: [], rowCount: 1 };
    });
    const log = new PostgresOutcomeLog(new PostgresConnectionManager(DEFAULT_POSTGRES_CONFIG));

    await log.append({ predictedConfidence: 0.8, wasCorrect: true, timestamp: 1_700_000_000_000 });
    const outcomes = await log.readAll();

    expect(mocks.pool.query.mock.calls[0][1]).toEqual([0.8, true, 1_700_000_000_000]);
    expect(outcomes).toEqual([{ predictedConfidence: 0.8, wasCorrect: true, timestamp: 1_700_000_000_000 }]);
  });

  it('wraps query errors as storage faults', async () => {
    mocks.pool.query.mockRejectedValue(new Error('connection refused'));
    const log = new PostgresOutcomeLog(new PostgresConnectionManager(DEFAULT_POSTGRES_CONFIG));

    await expect(log.init()).rejects.toBeInstanceOf(StorageFaultError);
  });
});

describe('InMemoryOutcomeLog', () => {
  it('returns copies of what was appended', async () => {
    const log = new InMemoryOutcomeLog();
    await log.init();
    await log.append({ predictedConfidence: 0.3, wasCorrect: true, timestamp: 5 });

    const outcomes = await log.readAll();
    outcomes.length = 0;

    await expect(log.readAll()).resolves.toEqual([{ predictedConfidence: 0.3, wasCorrect: true, timestamp: 5 }]);
  });
});
