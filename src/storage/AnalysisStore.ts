import type {
  AccuracyStats,
  BucketType,
  CorrectionEvent,
  CorrectionResult,
  LearnedPrediction,
  PatternHypothesis,
  PoleType,
  Material,
  SubjectRecord,
} from '../types/classification.js';

/**
 * I/O failure in the persistent store. Write paths surface it to the caller.
 */
export class StorageFaultError extends Error {
  constructor(
    message: string,
    public operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageFaultError';
  }
}

/**
 * Options for reading the correction log
 */
export interface CorrectionQueryOptions {
  /**
   * Only events at or after this epoch-millisecond timestamp
   */
  since?: number;

  /**
   * Maximum number of events, oldest first
   */
  limit?: number;
}

/**
 * Values recorded as the "before" side of a correction when the subject
 * has never been analyzed
 */
export interface CorrectionDefaults {
  material: Material;
  type: PoleType;
}

/**
 * Persistent store for subject records, the correction log and learned
 * pattern hypotheses. It is the only writer of those three tables.
 */
export interface AnalysisStore {
  /**
   * Create tables if needed
   */
  init(): Promise<void>;

  /**
   * Upsert a subject record keyed by subjectId
   */
  storeAnalysis(record: SubjectRecord): Promise<void>;

  /**
   * Write an engine decision as an unverified record, unless the stored
   * record is verified. The check and the write are one statement. An
   * existing row keeps its correction count, and its photo hash when the
   * decision has none. Resolves to whether a row was written.
   */
  cacheAnalysis(record: SubjectRecord): Promise<boolean>;

  getAnalysis(subjectId: string): Promise<SubjectRecord | null>;

  /**
   * Record a human correction atomically: log event, verified record and
   * pattern hypotheses all commit together or not at all
   */
  applyCorrection(subjectId: string, materialAfter: Material, typeAfter: PoleType): Promise<CorrectionResult>;

  queryLearnedPrediction(subjectId: string): Promise<LearnedPrediction | null>;

  listCorrections(options?: CorrectionQueryOptions): Promise<CorrectionEvent[]>;

  listHypotheses(bucketType?: BucketType, bucketValue?: number): Promise<PatternHypothesis[]>;

  /**
   * All subject records, newest first
   */
  exportSnapshot(): Promise<SubjectRecord[]>;

  /**
   * Bulk upsert in a single transaction
   */
  importRecords(records: SubjectRecord[]): Promise<number>;

  getAccuracyStats(): Promise<AccuracyStats>;

  close(): Promise<void>;
}

export function toStorageFault(operation: string, error: unknown): StorageFaultError {
  if (error instanceof StorageFaultError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageFaultError(`${operation} failed: ${message}`, operation, { cause: error });
}
