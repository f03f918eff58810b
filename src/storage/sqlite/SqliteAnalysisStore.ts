import Database from 'better-sqlite3';
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
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_FALLBACK } from '../../config/EngineConfig.js';

export interface SqliteAnalysisStoreOptions {
  /**
   * Database file; ':memory:' for an in-process store
   */
  filename?: string;

  /**
   * Existing connection, shared with other components (e.g. the outcome log)
   */
  database?: Database.Database;

  /**
   * "Before" values for corrections of never-analyzed subjects
   */
  defaults?: CorrectionDefaults;

  now?: () => number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS subject_records (
    subject_id TEXT PRIMARY KEY,
    material TEXT NOT NULL,
    type TEXT NOT NULL,
    confidence REAL NOT NULL,
    source_kind TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    verified INTEGER NOT NULL DEFAULT 0,
    correction_count INTEGER NOT NULL DEFAULT 0,
    photo_hash TEXT
  );

  CREATE TABLE IF NOT EXISTS correction_events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    subject_id TEXT NOT NULL,
    material_before TEXT NOT NULL,
    type_before TEXT NOT NULL,
    material_after TEXT NOT NULL,
    type_after TEXT NOT NULL,
    source_kind_before TEXT NOT NULL,
    timestamp INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_correction_events_subject ON correction_events(subject_id);

  CREATE TABLE IF NOT EXISTS pattern_hypotheses (
    bucket_type TEXT NOT NULL,
    bucket_value INTEGER NOT NULL,
    material TEXT NOT NULL,
    type TEXT NOT NULL,
    sample_count INTEGER NOT NULL,
    success_rate REAL NOT NULL,
    last_updated INTEGER NOT NULL,
    PRIMARY KEY (bucket_type, bucket_value, material, type)
  );
`;

/**
 * SQLite-backed analysis store (better-sqlite3).
 * Every multi-row write runs inside a single SQLite transaction.
 */
export class SqliteAnalysisStore implements AnalysisStore {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly defaults: CorrectionDefaults;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();
  private initialized = false;

  constructor(options: SqliteAnalysisStoreOptions = {}) {
    if (options.database) {
      this.db = options.database;
      this.ownsDatabase = false;
    } else {
      this.db = new Database(options.filename ?? 'pole-classifier.db');
      this.ownsDatabase = true;
    }
    this.defaults = options.defaults ?? { material: DEFAULT_FALLBACK.material, type: DEFAULT_FALLBACK.type };
    this.now = options.now ?? Date.now;
  }

  /**
   * Underlying connection, for components that keep their own tables in the same file
   */
  get database(): Database.Database {
    return this.db;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    try {
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
      this.initialized = true;
      logger.debug('SQLite analysis store initialized', { name: this.db.name });
    } catch (error) {
      throw toStorageFault('init', error);
    }
  }

  async storeAnalysis(record: SubjectRecord): Promise<void> {
    await this.locks.runExclusive(record.subjectId, () => {
      try {
        this.upsertRecord(record);
      } catch (error) {
        throw toStorageFault('storeAnalysis', error);
      }
    });
  }

  async cacheAnalysis(record: SubjectRecord): Promise<boolean> {
    return this.locks.runExclusive(record.subjectId, () => {
      try {
        const result = this.db
          .prepare(
            `INSERT INTO subject_records
              (subject_id, material, type, confidence, source_kind, timestamp, verified, correction_count, photo_hash)
             VALUES (@subjectId, @material, @type, @confidence, @sourceKind, @timestamp, 0, 0, @photoHash)
             ON CONFLICT (subject_id) DO UPDATE SET
               material = excluded.material,
               type = excluded.type,
               confidence = excluded.confidence,
               source_kind = excluded.source_kind,
               timestamp = excluded.timestamp,
               photo_hash = COALESCE(excluded.photo_hash, subject_records.photo_hash)
             WHERE subject_records.verified = 0`
          )
          .run({
            subjectId: record.subjectId,
            material: record.material,
            type: record.type,
            confidence: record.confidence,
            sourceKind: record.sourceKind,
            timestamp: record.timestamp || this.now(),
            photoHash: record.photoHash ?? null,
          });
        return result.changes > 0;
      } catch (error) {
        throw toStorageFault('cacheAnalysis', error);
      }
    });
  }

  async getAnalysis(subjectId: string): Promise<SubjectRecord | null> {
    try {
      const row = this.selectRecord(subjectId);
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
    return this.locks.runExclusive(subjectId, () => {
      const apply = this.db.transaction((): CorrectionResult => {
        const timestamp = this.now();
        const previousRow = this.selectRecord(subjectId);
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

        this.db
          .prepare(
            `INSERT INTO correction_events
              (id, subject_id, material_before, type_before, material_after, type_after, source_kind_before, timestamp)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            event.id,
            event.subjectId,
            event.materialBefore,
            event.typeBefore,
            event.materialAfter,
            event.typeAfter,
            event.sourceKindBefore,
            event.timestamp
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
        this.upsertRecord(record);

        const buckets = bucketsFor(subjectId);
        const bumpHypothesis = this.db.prepare(
          `INSERT INTO pattern_hypotheses
            (bucket_type, bucket_value, material, type, sample_count, success_rate, last_updated)
           VALUES (?, ?, ?, ?, 1, 0, ?)
           ON CONFLICT (bucket_type, bucket_value, material, type)
           DO UPDATE SET sample_count = sample_count + 1, last_updated = excluded.last_updated`
        );
        const refreshRates = this.db.prepare(
          `UPDATE pattern_hypotheses
           SET success_rate = CAST(sample_count AS REAL) / (
             SELECT SUM(sample_count) FROM pattern_hypotheses
             WHERE bucket_type = @bucketType AND bucket_value = @bucketValue
           )
           WHERE bucket_type = @bucketType AND bucket_value = @bucketValue`
        );
        for (const bucket of buckets) {
          bumpHypothesis.run(bucket.bucketType, bucket.bucketValue, materialAfter, typeAfter, timestamp);
          refreshRates.run({ bucketType: bucket.bucketType, bucketValue: bucket.bucketValue });
        }

        return { event, previous, record, hypothesesUpdated: buckets.length };
      });

      try {
        const result = apply();
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
        const leader = bucketLeader(this.selectHypotheses(bucket.bucketType, bucket.bucketValue));
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
      const rows = this.db
        .prepare<[number, number], CorrectionRow>(
          `SELECT id, subject_id, material_before, type_before, material_after, type_after,
                  source_kind_before, timestamp
           FROM correction_events
           WHERE timestamp >= ?
           ORDER BY seq ASC
           LIMIT ?`
        )
        .all(options.since ?? 0, options.limit ?? -1);
      return rows.map(rowToCorrection);
    } catch (error) {
      throw toStorageFault('listCorrections', error);
    }
  }

  async listHypotheses(bucketType?: BucketType, bucketValue?: number): Promise<PatternHypothesis[]> {
    try {
      let rows: HypothesisRow[];
      if (bucketType !== undefined && bucketValue !== undefined) {
        rows = this.selectHypothesisRows(bucketType, bucketValue);
      } else if (bucketType !== undefined) {
        rows = this.db
          .prepare<[string], HypothesisRow>(
            `SELECT * FROM pattern_hypotheses WHERE bucket_type = ?
             ORDER BY bucket_value, sample_count DESC, material, type`
          )
          .all(bucketType);
      } else {
        rows = this.db
          .prepare<[], HypothesisRow>(
            `SELECT * FROM pattern_hypotheses
             ORDER BY bucket_type, bucket_value, sample_count DESC, material, type`
          )
          .all();
      }
      return rowsToHypotheses(rows);
    } catch (error) {
      throw toStorageFault('listHypotheses', error);
    }
  }

  async exportSnapshot(): Promise<SubjectRecord[]> {
    try {
      const rows = this.db
        .prepare<[], SubjectRow>(`SELECT * FROM subject_records ORDER BY timestamp DESC, subject_id ASC`)
        .all();
      return rows.map(rowToRecord);
    } catch (error) {
      throw toStorageFault('exportSnapshot', error);
    }
  }

  async importRecords(records: SubjectRecord[]): Promise<number> {
    const importAll = this.db.transaction((batch: SubjectRecord[]) => {
      for (const record of batch) {
        this.upsertRecord(record);
      }
      return batch.length;
    });

    try {
      const count = importAll(records);
      logger.info(`Imported ${count} subject records`);
      return count;
    } catch (error) {
      throw toStorageFault('importRecords', error);
    }
  }

  async getAccuracyStats(): Promise<AccuracyStats> {
    try {
      const totals = this.db
        .prepare<[], { total: number; verified: number | null }>(
          `SELECT COUNT(*) AS total, SUM(verified) AS verified FROM subject_records`
        )
        .get();
      const corrections = this.db
        .prepare<[], { total: number; unchanged: number | null }>(
          `SELECT COUNT(*) AS total,
                  SUM(CASE WHEN material_before = material_after AND type_before = type_after THEN 1 ELSE 0 END) AS unchanged
           FROM correction_events`
        )
        .get();
      const bySource = this.db
        .prepare<[], SourceStatsRow>(
          `SELECT source_kind, COUNT(*) AS count, AVG(confidence) AS avg_confidence
           FROM subject_records GROUP BY source_kind ORDER BY source_kind`
        )
        .all();

      const correctionCount = corrections?.total ?? 0;
      return {
        totalAnalyzed: totals?.total ?? 0,
        verifiedCount: totals?.verified ?? 0,
        correctionCount,
        accuracyRate: correctionCount > 0 ? (corrections?.unchanged ?? 0) / correctionCount : 0,
        bySource: bySource.map(row => ({
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
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }

  private selectRecord(subjectId: string): SubjectRow | undefined {
    return this.db
      .prepare<[string], SubjectRow>(`SELECT * FROM subject_records WHERE subject_id = ?`)
      .get(subjectId);
  }

  private selectHypothesisRows(bucketType: BucketType, bucketValue: number): HypothesisRow[] {
    return this.db
      .prepare<[string, number], HypothesisRow>(
        `SELECT * FROM pattern_hypotheses WHERE bucket_type = ? AND bucket_value = ?
         ORDER BY sample_count DESC, success_rate DESC, material, type`
      )
      .all(bucketType, bucketValue);
  }

  private selectHypotheses(bucketType: BucketType, bucketValue: number): PatternHypothesis[] {
    return rowsToHypotheses(this.selectHypothesisRows(bucketType, bucketValue));
  }

  private upsertRecord(record: SubjectRecord): void {
    this.db
      .prepare(
        `INSERT INTO subject_records
          (subject_id, material, type, confidence, source_kind, timestamp, verified, correction_count, photo_hash)
         VALUES (@subjectId, @material, @type, @confidence, @sourceKind, @timestamp, @verified, @correctionCount, @photoHash)
         ON CONFLICT (subject_id) DO UPDATE SET
           material = excluded.material,
           type = excluded.type,
           confidence = excluded.confidence,
           source_kind = excluded.source_kind,
           timestamp = excluded.timestamp,
           verified = excluded.verified,
           correction_count = excluded.correction_count,
           photo_hash = excluded.photo_hash`
      )
      .run({
        subjectId: record.subjectId,
        material: record.material,
        type: record.type,
        confidence: record.confidence,
        sourceKind: record.sourceKind,
        timestamp: record.timestamp || this.now(),
        verified: record.verified ? 1 : 0,
        correctionCount: record.correctionCount,
        photoHash: record.photoHash ?? null,
      });
  }
}
