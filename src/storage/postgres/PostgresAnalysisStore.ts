import type { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type {
  AccuracyStats,
  BucketType,
  CorrectionEvent,
  CorrectionResult,
  LearnedPrediction,
  Material,
  PatternHypothesis,
  PoleType,
  SubjectRecord,
} from '../../types/classification.js';
import {
  type AnalysisStore,
  type CorrectionDefaults,
  type CorrectionQueryOptions,
  toStorageFault,
} from '../AnalysisStore.js';
import { bestLearnedPrediction, bucketLeader, bucketsFor } from '../buckets.js';
import {
  type CorrectionRow,
  type HypothesisRow,
  type SourceStatsRow,
  type SubjectRow,
  rowToCorrection,
  rowToRecord,
  rowsToHypotheses,
  toSourceKind,
} from '../rows.js';
import { PostgresConnectionManager } from './PostgresConnectionManager.js';
import type { PostgresConfig } from './PostgresConfig.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_FALLBACK } from '../../config/EngineConfig.js';

export interface PostgresAnalysisStoreOptions {
  connection: PostgresConfig | PostgresConnectionManager;
  defaults?: CorrectionDefaults;
  now?: () => number;
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS subject_records (
    subject_id TEXT PRIMARY KEY,
    material TEXT NOT NULL,
    type TEXT NOT NULL,
    confidence DOUBLE PRECISION NOT NULL,
    source_kind TEXT NOT NULL,
    timestamp BIGINT NOT NULL,
    verified BOOLEAN NOT NULL DEFAULT FALSE,
    correction_count INTEGER NOT NULL DEFAULT 0,
    photo_hash TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS correction_events (
    seq BIGSERIAL PRIMARY KEY,
    id UUID NOT NULL UNIQUE,
    subject_id TEXT NOT NULL,
    material_before TEXT NOT NULL,
    type_before TEXT NOT NULL,
    material_after TEXT NOT NULL,
    type_after TEXT NOT NULL,
    source_kind_before TEXT NOT NULL,
    timestamp BIGINT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_correction_events_subject ON correction_events(subject_id)`,
  `CREATE TABLE IF NOT EXISTS pattern_hypotheses (
    bucket_type TEXT NOT NULL,
    bucket_value BIGINT NOT NULL,
    material TEXT NOT NULL,
    type TEXT NOT NULL,
    sample_count INTEGER NOT NULL,
    success_rate DOUBLE PRECISION NOT NULL,
    last_updated BIGINT NOT NULL,
    PRIMARY KEY (bucket_type, bucket_value, material, type)
  )`,
];

const UPSERT_RECORD = `
  INSERT INTO subject_records
    (subject_id, material, type, confidence, source_kind, timestamp, verified, correction_count, photo_hash)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT (subject_id) DO UPDATE SET
    material = EXCLUDED.material,
    type = EXCLUDED.type,
    confidence = EXCLUDED.confidence,
    source_kind = EXCLUDED.source_kind,
    timestamp = EXCLUDED.timestamp,
    verified = EXCLUDED.verified,
    correction_count = EXCLUDED.correction_count,
    photo_hash = EXCLUDED.photo_hash`;

const CACHE_RECORD = `
  INSERT INTO subject_records
    (subject_id, material, type, confidence, source_kind, timestamp, verified, correction_count, photo_hash)
  VALUES ($1, $2, $3, $4, $5, $6, FALSE, 0, $7)
  ON CONFLICT (subject_id) DO UPDATE SET
    material = EXCLUDED.material,
    type = EXCLUDED.type,
    confidence = EXCLUDED.confidence,
    source_kind = EXCLUDED.source_kind,
    timestamp = EXCLUDED.timestamp,
    photo_hash = COALESCE(EXCLUDED.photo_hash, subject_records.photo_hash)
  WHERE NOT subject_records.verified`;

const LOCK_BUCKET = `SELECT pg_advisory_xact_lock(hashtext($1::text || ':' || $2::text))`;

/**
 * PostgreSQL-backed analysis store (pg).
 * Corrections lock the subject row with FOR UPDATE inside one transaction,
 * then every touched bucket with a transaction-scoped advisory lock, always
 * in BUCKET_FUNCTIONS order.
 */
export class PostgresAnalysisStore implements AnalysisStore {
  private readonly connection: PostgresConnectionManager;
  private readonly defaults: CorrectionDefaults;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();

  constructor(options: PostgresAnalysisStoreOptions) {
    this.connection =
      options.connection instanceof PostgresConnectionManager
        ? options.connection
        : new PostgresConnectionManager(options.connection);
    this.defaults = options.defaults ?? { material: DEFAULT_FALLBACK.material, type: DEFAULT_FALLBACK.type };
    this.now = options.now ?? Date.now;
  }

  get connectionManager(): PostgresConnectionManager {
    return this.connection;
  }

  async init(): Promise<void> {
    try {
      await this.connection.withTransaction(async client => {
        for (const statement of SCHEMA) {
          await client.query(statement);
        }
      });
      logger.debug('PostgreSQL analysis store initialized');
    } catch (error) {
      throw toStorageFault('init', error);
    }
  }

  async storeAnalysis(record: SubjectRecord): Promise<void> {
    await this.locks.runExclusive(record.subjectId, async () => {
      try {
        await this.connection.query(UPSERT_RECORD, this.recordParams(record));
      } catch (error) {
        throw toStorageFault('storeAnalysis', error);
      }
    });
  }

  async cacheAnalysis(record: SubjectRecord): Promise<boolean> {
    return this.locks.runExclusive(record.subjectId, async () => {
      try {
        const result = await this.connection.query(CACHE_RECORD, [
          record.subjectId,
          record.material,
          record.type,
          record.confidence,
          record.sourceKind,
          record.timestamp || this.now(),
          record.photoHash ?? null,
        ]);
        return (result.rowCount ?? 0) > 0;
      } catch (error) {
        throw toStorageFault('cacheAnalysis', error);
      }
    });
  }

  async getAnalysis(subjectId: string): Promise<SubjectRecord | null> {
    try {
      const result = await this.connection.query<SubjectRow>(
        `SELECT * FROM subject_records WHERE subject_id = $1`,
        [subjectId]
      );
      const row = result.rows[0];
      return row ? rowToRecord(row) : null;
    } catch (error) {
      throw toStorageFault('getAnalysis', error);
    }
  }

  async applyCorrection(
    subjectId: string,
    materialAfter: Material,
    typeAfter: PoleType
  ): Promise<CorrectionResult> {
    return this.locks.runExclusive(subjectId, async () => {
      try {
        const result = await this.connection.withTransaction(client =>
          this.correctInTransaction(client, subjectId, materialAfter, typeAfter)
        );
        logger.info(`Applied correction for subject ${subjectId}`, {
          before: `${result.event.materialBefore} | ${result.event.typeBefore}`,
          after: `${materialAfter} | ${typeAfter}`,
          hypothesesUpdated: result.hypothesesUpdated,
        });
        return result;
      } catch (error) {
        throw toStorageFault('applyCorrection', error);
      }
    });
  }

  async queryLearnedPrediction(subjectId: string): Promise<LearnedPrediction | null> {
    const buckets = bucketsFor(subjectId);
    if (buckets.length === 0) {
      return null;
    }

    try {
      const leaders: PatternHypothesis[] = [];
      for (const bucket of buckets) {
        const leader = bucketLeader(await this.selectHypotheses(bucket.bucketType, bucket.bucketValue));
        if (leader) {
          leaders.push(leader);
        }
      }
      return bestLearnedPrediction(leaders);
    } catch (error) {
      throw toStorageFault('queryLearnedPrediction', error);
    }
  }

  async listCorrections(options: CorrectionQueryOptions = {}): Promise<CorrectionEvent[]> {
    try {
      const result = await this.connection.query<CorrectionRow>(
        `SELECT id, subject_id, material_before, type_before, material_after, type_after,
                source_kind_before, timestamp
         FROM correction_events
         WHERE timestamp >= $1
         ORDER BY seq ASC
         LIMIT $2`,
        [options.since ?? 0, options.limit ?? null]
      );
      return result.rows.map(rowToCorrection);
    } catch (error) {
      throw toStorageFault('listCorrections', error);
    }
  }

  async listHypotheses(bucketType?: BucketType, bucketValue?: number): Promise<PatternHypothesis[]> {
    try {
      if (bucketType !== undefined && bucketValue !== undefined) {
        return await this.selectHypotheses(bucketType, bucketValue);
      }
      const result = await this.connection.query<HypothesisRow>(
        `SELECT * FROM pattern_hypotheses
         WHERE $1::text IS NULL OR bucket_type = $1
         ORDER BY bucket_type, bucket_value, sample_count DESC, material, type`,
        [bucketType ?? null]
      );
      return rowsToHypotheses(result.rows);
    } catch (error) {
      throw toStorageFault('listHypotheses', error);
    }
  }

  async exportSnapshot(): Promise<SubjectRecord[]> {
    try {
      const result = await this.connection.query<SubjectRow>(
        `SELECT * FROM subject_records ORDER BY timestamp DESC, subject_id ASC`
      );
      return result.rows.map(rowToRecord);
    } catch (error) {
      throw toStorageFault('exportSnapshot', error);
    }
  }

  async importRecords(records: SubjectRecord[]): Promise<number> {
    try {
      const count = await this.connection.withTransaction(async client => {
        for (const record of records) {
          await client.query(UPSERT_RECORD, this.recordParams(record));
        }
        return records.length;
      });
      logger.info(`Imported ${count} subject records`);
      return count;
    } catch (error) {
      throw toStorageFault('importRecords', error);
    }
  }

  async getAccuracyStats(): Promise<AccuracyStats> {
    try {
      const totals = await this.connection.query<{ total: string; verified: string | null }>(
        `SELECT COUNT(*) AS total, SUM(CASE WHEN verified THEN 1 ELSE 0 END) AS verified FROM subject_records`
      );
      const corrections = await this.connection.query<{ total: string; unchanged: string | null }>(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN material_before = material_after AND type_before = type_after THEN 1 ELSE 0 END) AS unchanged
         FROM correction_events`
      );
      const bySource = await this.connection.query<SourceStatsRow>(
        `SELECT source_kind, COUNT(*) AS count, AVG(confidence) AS avg_confidence
         FROM subject_records GROUP BY source_kind ORDER BY source_kind`
      );

      const correctionCount = Number(corrections.rows[0]?.total ?? 0);
      return {
        totalAnalyzed: Number(totals.rows[0]?.total ?? 0),
        verifiedCount: Number(totals.rows[0]?.verified ?? 0),
        correctionCount,
        accuracyRate: correctionCount > 0 ? Number(corrections.rows[0]?.unchanged ?? 0) / correctionCount : 0,
        bySource: bySource.rows.map(row => ({
          sourceKind: toSourceKind(row.source_kind),
          count: Number(row.count),
          avgConfidence: Number(row.avg_confidence),
        })),
      };
    } catch (error) {
      throw toStorageFault('getAccuracyStats', error);
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  private async correctInTransaction(
    client: PoolClient,
    subjectId: string,
    materialAfter: Material,
    typeAfter: PoleType
  ): Promise<CorrectionResult> {
    const timestamp = this.now();
    const previousResult = await client.query<SubjectRow>(
      `SELECT * FROM subject_records WHERE subject_id = $1 FOR UPDATE`,
      [subjectId]
    );
    const previousRow = previousResult.rows[0];
    const previous = previousRow ? rowToRecord(previousRow) : null;

    const event: CorrectionEvent = {
      id: uuidv4(),
      subjectId,
      materialBefore: previous?.material ?? this.defaults.material,
      typeBefore: previous?.type ?? this.defaults.type,
      materialAfter,
      typeAfter,
      sourceKindBefore: previous?.sourceKind ?? 'fallback',
      timestamp,
    };

    await client.query(
      `INSERT INTO correction_events
        (id, subject_id, material_before, type_before, material_after, type_after, source_kind_before, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        event.id,
        event.subjectId,
        event.materialBefore,
        event.typeBefore,
        event.materialAfter,
        event.typeAfter,
        event.sourceKindBefore,
        event.timestamp,
      ]
    );

    const record: SubjectRecord = {
      subjectId,
      material: materialAfter,
      type: typeAfter,
      confidence: 1.0,
      sourceKind: 'human_correction',
      timestamp,
      verified: true,
      correctionCount: (previous?.correctionCount ?? 0) + 1,
    };
    if (previous?.photoHash) {
      record.photoHash = previous.photoHash;
    }
    await client.query(UPSERT_RECORD, this.recordParams(record));

    const buckets = bucketsFor(subjectId);
    // success rates are recomputed from the whole bucket, so concurrent
    // corrections of other subjects in the same bucket must wait
    for (const bucket of buckets) {
      await client.query(LOCK_BUCKET, [bucket.bucketType, bucket.bucketValue]);
    }
    for (const bucket of buckets) {
      await client.query(
        `INSERT INTO pattern_hypotheses
          (bucket_type, bucket_value, material, type, sample_count, success_rate, last_updated)
         VALUES ($1, $2, $3, $4, 1, 0, $5)
         ON CONFLICT (bucket_type, bucket_value, material, type)
         DO UPDATE SET sample_count = pattern_hypotheses.sample_count + 1, last_updated = EXCLUDED.last_updated`,
        [bucket.bucketType, bucket.bucketValue, materialAfter, typeAfter, timestamp]
      );
      await client.query(
        `UPDATE pattern_hypotheses AS h
         SET success_rate = h.sample_count::double precision / totals.total
         FROM (
           SELECT SUM(sample_count) AS total FROM pattern_hypotheses
           WHERE bucket_type = $1 AND bucket_value = $2
         ) AS totals
         WHERE h.bucket_type = $1 AND h.bucket_value = $2`,
        [bucket.bucketType, bucket.bucketValue]
      );
    }

    return { event, previous, record, hypothesesUpdated: buckets.length };
  }

  private async selectHypotheses(bucketType: BucketType, bucketValue: number): Promise<PatternHypothesis[]> {
    const result = await this.connection.query<HypothesisRow>(
      `SELECT * FROM pattern_hypotheses WHERE bucket_type = $1 AND bucket_value = $2
       ORDER BY sample_count DESC, success_rate DESC, material, type`,
      [bucketType, bucketValue]
    );
    return rowsToHypotheses(result.rows);
  }

  private recordParams(record: SubjectRecord): unknown[] {
    return [
      record.subjectId,
      record.material,
      record.type,
      record.confidence,
      record.sourceKind,
      record.timestamp || this.now(),
      record.verified,
      record.correctionCount,
      record.photoHash ?? null,
    ];
  }
}
