import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PostgresAnalysisStore } from '../../postgres/PostgresAnalysisStore.js';
import { PostgresConnectionManager } from '../../postgres/PostgresConnectionManager.js';
import { DEFAULT_POSTGRES_CONFIG } from '../../postgres/PostgresConfig.js';
import { StorageFaultError } from '../../AnalysisStore.js';
import type { SubjectRecord } from '../../../types/classification.js';

// In-process stand-in for the pg pool and its clients
const mocks = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() };
  const pool = {
    query: vi.fn(),
    connect: vi.fn(async () => client),
    on: vi.fn(),
    end: vi.fn(async () => {}),
  };
  const Pool = vi.fn(function () {
    return pool;
  });
  return { client, pool, Pool };
});

vi.mock('pg', () => ({ default: { Pool: mocks.Pool } }));

const SIGN = 'stĺp značky samostatný';

function statements(): string[] {
  return mocks.client.query.mock.calls.map(call => String(call[0]).trim().split(/\s+/).slice(0, 3).join(' '));
}

function clientFailsOn(pattern?: RegExp): void {
  mocks.client.query.mockImplementation(async (text: string) => {
    if (pattern && pattern.test(text)) {
      throw new Error('connection reset');
    }
    return { rows: [], rowCount: 0 };
  });
}

describe('PostgresConnectionManager', () => {
  beforeEach(() => {
    mocks.client.query.mockReset();
    mocks.client.release.mockClear();
    mocks.pool.query.mockReset();
  });

  it('commits work between BEGIN and COMMIT on one client', async () => {
    clientFailsOn();
    const manager = new PostgresConnectionManager(DEFAULT_POSTGRES_CONFIG);

    const result = await manager.withTransaction(async client => {
      await client.query('SELECT 1');
      return 7;
    });

    expect(result).toBe(7);
    expect(statements()).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(mocks.client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows when the work fails', async () => {
    clientFailsOn();
    const manager = new PostgresConnectionManager(DEFAULT_POSTGRES_CONFIG);

    await expect(
      manager.withTransaction(async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');

    expect(statements()).toEqual(['BEGIN', 'ROLLBACK']);
    expect(mocks.client.release).toHaveBeenCalledTimes(1);
  });
});

describe('PostgresAnalysisStore', () => {
  let store: PostgresAnalysisStore;

  beforeEach(() => {
    mocks.client.query.mockReset();
    mocks.client.release.mockClear();
    mocks.pool.query.mockReset();
    mocks.pool.end.mockClear();
    store = new PostgresAnalysisStore({ connection: DEFAULT_POSTGRES_CONFIG, now: () => 5_000 });
  });

  it('applies a correction in one transaction', async () => {
    clientFailsOn();

    const result = await store.applyCorrection('42', 'betón', SIGN);

    expect(result.previous).toBeNull();
    expect(result.hypothesesUpdated).toBe(5);
    expect(result.record).toEqual({
      subjectId: '42',
      material: 'betón',
      type: SIGN,
      confidence: 1,
      sourceKind: 'human_correction',
      timestamp: 5_000,
      verified: true,
      correctionCount: 1,
    });

    const issued = statements();
    expect(issued[0]).toBe('BEGIN');
    expect(issued[1]).toBe('SELECT * FROM');
    expect(issued[issued.length - 1]).toBe('COMMIT');
    // BEGIN, row lock, event, record, five bucket locks, five buckets times (upsert + rate refresh), COMMIT
    expect(issued).toHaveLength(19);
  });

  it('locks every touched bucket before recomputing its success rates', async () => {
    clientFailsOn();

    await store.applyCorrection('42', 'betón', SIGN);

    const calls = mocks.client.query.mock.calls.map(call => ({ text: String(call[0]), params: call[1] }));
    const lockIndexes = calls.flatMap((call, index) => (call.text.includes('pg_advisory_xact_lock') ? [index] : []));
    expect(lockIndexes.map(index => calls[index].params)).toEqual([
      ['mod10', 2],
      ['mod15', 12],
      ['mod20', 2],
      ['div50', 0],
      ['div100', 0],
    ]);
    const firstBucketWrite = calls.findIndex(call => call.text.includes('INSERT INTO pattern_hypotheses'));
    expect(Math.max(...lockIndexes)).toBeLessThan(firstBucketWrite);
  });

  it('caches a decision only over an unverified record', async () => {
    mocks.pool.query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });
    const decision: SubjectRecord = {
      subjectId: '42',
      material: 'kov',
      type: SIGN,
      confidence: 0.8,
      sourceKind: 'ensemble',
      timestamp: 1_000,
      verified: false,
      correctionCount: 0,
    };

    expect(await store.cacheAnalysis(decision)).toBe(true);
    expect(await store.cacheAnalysis(decision)).toBe(false);

    const [text, params] = mocks.pool.query.mock.calls[0];
    expect(String(text)).toContain('WHERE NOT subject_records.verified');
    expect(params).toEqual(['42', 'kov', SIGN, 0.8, 'ensemble', 1_000, null]);
  });

  it('rolls back the whole correction when a hypothesis write fails', async () => {
    clientFailsOn(/INSERT INTO pattern_hypotheses/);

    await expect(store.applyCorrection('42', 'betón', SIGN)).rejects.toBeInstanceOf(StorageFaultError);

    const issued = statements();
    expect(issued).toContain('INSERT INTO correction_events');
    expect(issued).toContain('ROLLBACK');
    expect(issued).not.toContain('COMMIT');
    expect(mocks.client.release).toHaveBeenCalledTimes(1);
  });

  it('maps string BIGINT columns back to numbers', async () => {
    mocks.pool.query.mockResolvedValueOnce({
      rows: [
        {
          subject_id: '42',
          material: 'kov',
          type: SIGN,
          confidence: 0.75,
          source_kind: 'ensemble',
          timestamp: '1700000000000',
          verified: false,
          correction_count: '2',
          photo_hash: null,
        },
      ],
    });

    expect(await store.getAnalysis('42')).toEqual({
      subjectId: '42',
      material: 'kov',
      type: SIGN,
      confidence: 0.75,
      sourceKind: 'ensemble',
      timestamp: 1_700_000_000_000,
      verified: false,
      correctionCount: 2,
    });
  });

  it('lists corrections without a limit by default', async () => {
    mocks.pool.query.mockResolvedValueOnce({ rows: [] });

    await store.listCorrections();

    expect(mocks.pool.query.mock.calls[0][1]).toEqual([0, null]);
  });

  it('converts aggregate counts to numbers', async () => {
    mocks.pool.query
      .mockResolvedValueOnce({ rows: [{ total: '4', verified: '3' }] })
      .mockResolvedValueOnce({ rows: [{ total: '4', unchanged: '1' }] })
      .mockResolvedValueOnce({
        rows: [
          { source_kind: 'ensemble', count: '1', avg_confidence: '0.7' },
          { source_kind: 'human_correction', count: '3', avg_confidence: '1' },
        ],
      });

    expect(await store.getAccuracyStats()).toEqual({
      totalAnalyzed: 4,
      verifiedCount: 3,
      correctionCount: 4,
      accuracyRate: 0.25,
      bySource: [
        { sourceKind: 'ensemble', count: 1, avgConfidence: 0.7 },
        { sourceKind: 'human_correction', count: 3, avgConfidence: 1 },
      ],
    });
  });

  it('wraps query errors in StorageFaultError', async () => {
    mocks.pool.query.mockRejectedValueOnce(new Error('connection refused'));

    await expect(store.getAnalysis('42')).rejects.toBeInstanceOf(StorageFaultError);
  });

  it('ends the pool on close', async () => {
    mocks.pool.query.mockResolvedValueOnce({ rows: [] });
    await store.exportSnapshot();

    await store.close();

    expect(mocks.pool.end).toHaveBeenCalledTimes(1);
  });
});
