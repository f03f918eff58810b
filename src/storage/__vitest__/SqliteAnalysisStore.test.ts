import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteAnalysisStore } from '../sqlite/SqliteAnalysisStore.js';
import { StorageFaultError } from '../AnalysisStore.js';
import { bucketLeader } from '../buckets.js';
import type { SubjectRecord } from '../../types/classification.js';

const SIGN = 'stĺp značky samostatný';
const LIGHT = 'stĺp verejného osvetlenia';

function record(overrides: Partial<SubjectRecord> = {}): SubjectRecord {
  return {
    subjectId: '100',
    material: 'kov',
    type: SIGN,
    confidence: 0.8,
    sourceKind: 'ensemble',
    timestamp: 1_000,
    verified: false,
    correctionCount: 0,
    ...overrides,
  };
}

describe('SqliteAnalysisStore', () => {
  let store: SqliteAnalysisStore;
  let clock: number;

  beforeEach(async () => {
    clock = 10_000;
    store = new SqliteAnalysisStore({ filename: ':memory:', now: () => ++clock });
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('records', () => {
    it('stores and reads back a record', async () => {
      await store.storeAnalysis(record({ photoHash: 'abc123' }));

      expect(await store.getAnalysis('100')).toEqual(record({ photoHash: 'abc123' }));
      expect(await store.getAnalysis('101')).toBeNull();
    });

    it('upserts by subject id', async () => {
      await store.storeAnalysis(record());
      await store.storeAnalysis(record({ material: 'betón', confidence: 0.6 }));

      const stored = await store.getAnalysis('100');
      expect(stored?.material).toBe('betón');
      expect(stored?.confidence).toBe(0.6);
      expect(await store.exportSnapshot()).toHaveLength(1);
    });

    it('exports newest first', async () => {
      await store.storeAnalysis(record({ subjectId: 'old', timestamp: 1 }));
      await store.storeAnalysis(record({ subjectId: 'new', timestamp: 2 }));

      const ids = (await store.exportSnapshot()).map(r => r.subjectId);
      expect(ids).toEqual(['new', 'old']);
    });

    it('imports records in one transaction', async () => {
      const count = await store.importRecords([
        record({ subjectId: '1', sourceKind: 'imported' }),
        record({ subjectId: '2', sourceKind: 'imported' }),
      ]);

      expect(count).toBe(2);
      expect((await store.getAnalysis('2'))?.sourceKind).toBe('imported');
    });
  });

  describe('cacheAnalysis', () => {
    it('inserts an unverified record for a new subject', async () => {
      expect(await store.cacheAnalysis(record({ subjectId: '200', photoHash: 'p1' }))).toBe(true);

      expect(await store.getAnalysis('200')).toEqual(record({ subjectId: '200', photoHash: 'p1' }));
    });

    it('overwrites an unverified record but keeps its correction count and photo hash', async () => {
      await store.storeAnalysis(record({ photoHash: 'abc123', correctionCount: 3 }));

      const written = await store.cacheAnalysis(record({ material: 'betón', confidence: 0.6, timestamp: 2_000 }));

      expect(written).toBe(true);
      expect(await store.getAnalysis('100')).toEqual(
        record({ material: 'betón', confidence: 0.6, timestamp: 2_000, correctionCount: 3, photoHash: 'abc123' })
      );
    });

    it('leaves a verified record untouched', async () => {
      const corrected = await store.applyCorrection('100', 'betón', LIGHT);

      expect(await store.cacheAnalysis(record({ photoHash: 'p2' }))).toBe(false);
      expect(await store.getAnalysis('100')).toEqual(corrected.record);
    });
  });

  describe('applyCorrection', () => {
    it('logs the event, verifies the record and updates all five buckets', async () => {
      await store.storeAnalysis(record({ photoHash: 'abc123' }));

      const result = await store.applyCorrection('100', 'betón', LIGHT);

      expect(result.hypothesesUpdated).toBe(5);
      expect(result.previous).toEqual(record({ photoHash: 'abc123' }));
      expect(result.event).toMatchObject({
        subjectId: '100',
        materialBefore: 'kov',
        typeBefore: SIGN,
        materialAfter: 'betón',
        typeAfter: LIGHT,
        sourceKindBefore: 'ensemble',
        timestamp: 10_001,
      });
      expect(result.record).toEqual({
        subjectId: '100',
        material: 'betón',
        type: LIGHT,
        confidence: 1,
        sourceKind: 'human_correction',
        timestamp: 10_001,
        verified: true,
        correctionCount: 1,
        photoHash: 'abc123',
      });
      expect(await store.getAnalysis('100')).toEqual(result.record);
      expect(await store.listHypotheses()).toHaveLength(5);
    });

    it('uses the defaults as "before" values for a never-analyzed subject', async () => {
      const result = await store.applyCorrection('7', 'betón', LIGHT);

      expect(result.previous).toBeNull();
      expect(result.event.materialBefore).toBe('kov');
      expect(result.event.typeBefore).toBe(SIGN);
      expect(result.event.sourceKindBefore).toBe('fallback');
    });

    it('counts repeated corrections', async () => {
      await store.applyCorrection('5', 'kov', SIGN);
      const second = await store.applyCorrection('5', 'betón', SIGN);

      expect(second.record.correctionCount).toBe(2);
      expect(second.previous?.verified).toBe(true);
      expect(await store.listCorrections()).toHaveLength(2);
    });

    it('keeps non-numeric ids out of the pattern tables', async () => {
      const result = await store.applyCorrection('north-gate', 'drevo', SIGN);

      expect(result.hypothesesUpdated).toBe(0);
      expect(await store.listHypotheses()).toEqual([]);
      expect(await store.queryLearnedPrediction('north-gate')).toBeNull();
    });

    it('keeps success rates equal to each label share of its bucket', async () => {
      await store.applyCorrection('11', 'kov', SIGN);
      await store.applyCorrection('21', 'betón', LIGHT);
      await store.applyCorrection('31', 'betón', LIGHT);

      const bucket = await store.listHypotheses('mod10', 1);
      expect(bucket.map(h => [h.material, h.sampleCount])).toEqual([
        ['betón', 2],
        ['kov', 1],
      ]);
      expect(bucket[0].successRate).toBeCloseTo(2 / 3);
      expect(bucket[1].successRate).toBeCloseTo(1 / 3);
    });

    it('leaves no partial state when a write inside the transaction fails', async () => {
      const database = new Database(':memory:');
      const shared = new SqliteAnalysisStore({ database });
      await shared.init();
      database.exec(`
        CREATE TRIGGER reject_label BEFORE INSERT ON pattern_hypotheses
        WHEN NEW.material = 'unknown-material'
        BEGIN
          SELECT RAISE(ABORT, 'rejected label');
        END;
      `);

      await expect(shared.applyCorrection('50', 'unknown-material', SIGN)).rejects.toBeInstanceOf(StorageFaultError);

      expect(await shared.getAnalysis('50')).toBeNull();
      expect(await shared.listCorrections()).toEqual([]);
      expect(await shared.listHypotheses()).toEqual([]);
      database.close();
    });
  });

  describe('queryLearnedPrediction', () => {
    it('returns the most confident bucket leader, first bucket on ties', async () => {
      await store.applyCorrection('10', 'kov', LIGHT);
      await store.applyCorrection('20', 'kov', LIGHT);
      await store.applyCorrection('30', 'kov', LIGHT);

      const prediction = await store.queryLearnedPrediction('40');

      expect(prediction).toMatchObject({
        material: 'kov',
        type: LIGHT,
        bucketType: 'mod10',
        bucketValue: 0,
        sampleCount: 3,
      });
      expect(prediction?.confidence).toBeCloseTo(0.3);
    });

    it('learns a label from repeated corrections of one subject', async () => {
      for (let i = 0; i < 5; i++) {
        await store.applyCorrection('120', 'betón', LIGHT);
      }

      const hypotheses = await store.listHypotheses();
      expect(hypotheses.map(h => [h.bucketType, h.bucketValue, h.sampleCount, h.successRate])).toEqual([
        ['div100', 1, 5, 1],
        ['div50', 2, 5, 1],
        ['mod10', 0, 5, 1],
        ['mod15', 0, 5, 1],
        ['mod20', 0, 5, 1],
      ]);
      expect(await store.queryLearnedPrediction('120')).toEqual({
        material: 'betón',
        type: LIGHT,
        confidence: 0.5,
        bucketType: 'mod10',
        bucketValue: 0,
        sampleCount: 5,
      });
    });

    it('hands a bucket to a competing label once it has more samples', async () => {
      for (let i = 0; i < 5; i++) {
        await store.applyCorrection('120', 'betón', LIGHT);
        await store.applyCorrection('10', 'kov', SIGN);
      }

      const tied = await store.listHypotheses('mod10', 0);
      expect(tied.map(h => [h.material, h.sampleCount, h.successRate])).toEqual([
        ['betón', 5, 0.5],
        ['kov', 5, 0.5],
      ]);
      expect(bucketLeader(tied)?.material).toBe('betón');

      await store.applyCorrection('10', 'kov', SIGN);

      const overtaken = await store.listHypotheses('mod10', 0);
      expect(overtaken.map(h => [h.material, h.sampleCount])).toEqual([
        ['kov', 6],
        ['betón', 5],
      ]);
      expect(overtaken[0].successRate).toBeCloseTo(6 / 11, 10);
      expect(overtaken[1].successRate).toBeCloseTo(5 / 11, 10);
      expect(bucketLeader(overtaken)).toMatchObject({ material: 'kov', type: SIGN });

      // mod10 now lends 6/11 × 0.6 to kov; the untouched mod15 bucket still backs betón at 0.5
      expect(await store.queryLearnedPrediction('120')).toEqual({
        material: 'betón',
        type: LIGHT,
        confidence: 0.5,
        bucketType: 'mod15',
        bucketValue: 0,
        sampleCount: 5,
      });
    });

    it('is null when no bucket has a hypothesis', async () => {
      expect(await store.queryLearnedPrediction('12345')).toBeNull();
    });
  });

  describe('listCorrections', () => {
    it('filters by time and limits oldest first', async () => {
      await store.applyCorrection('1', 'kov', SIGN);
      await store.applyCorrection('2', 'kov', SIGN);
      await store.applyCorrection('3', 'kov', SIGN);

      const since = await store.listCorrections({ since: 10_002 });
      expect(since.map(e => e.subjectId)).toEqual(['2', '3']);

      const limited = await store.listCorrections({ limit: 1 });
      expect(limited.map(e => e.subjectId)).toEqual(['1']);
    });
  });

  describe('getAccuracyStats', () => {
    it('counts records, verified records and unchanged corrections', async () => {
      await store.storeAnalysis(record({ subjectId: 's1', material: 'kov', type: SIGN }));
      await store.applyCorrection('s1', 'kov', SIGN);
      await store.applyCorrection('s2', 'betón', LIGHT);

      expect(await store.getAccuracyStats()).toEqual({
        totalAnalyzed: 2,
        verifiedCount: 2,
        correctionCount: 2,
        accuracyRate: 0.5,
        bySource: [{ sourceKind: 'human_correction', count: 2, avgConfidence: 1 }],
      });
    });

    it('reports zeros on an empty store', async () => {
      expect(await store.getAccuracyStats()).toEqual({
        totalAnalyzed: 0,
        verifiedCount: 0,
        correctionCount: 0,
        accuracyRate: 0,
        bySource: [],
      });
    });
  });

  it('wraps I/O errors in StorageFaultError', async () => {
    const closed = new SqliteAnalysisStore({ filename: ':memory:' });
    await closed.init();
    await closed.close();

    await expect(closed.storeAnalysis(record())).rejects.toBeInstanceOf(StorageFaultError);
  });
});
