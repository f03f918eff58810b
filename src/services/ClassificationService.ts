/**
 * Classification Service
 *
 * Application facade over the decision engine, the analysis store and the
 * calibration layer. Routes and the CLI talk only to this class.
 */

import type {
  AccuracyStats,
  CorrectionResult,
  Decision,
  Material,
  PoleType,
  SubjectRecord,
} from '../types/classification.js';
import type { AnalysisStore } from '../storage/AnalysisStore.js';
import type { EnsembleDecisionEngine } from '../engine/EnsembleDecisionEngine.js';
import type { DecideManyOptions, DecideOptions } from '../engine/types.js';
import type { CalibrationService } from '../calibration/CalibrationService.js';
import type { AccuracyTrend, BinReport, ConfusionAxis, ConfusionTally } from '../calibration/types.js';
import { logger } from '../utils/logger.js';

export type ExportFormat = 'json' | 'csv';

export interface CalibrationSummary {
  bins: BinReport[];
  confusions: Record<ConfusionAxis, ConfusionTally[]>;
  trend: AccuracyTrend;
  hints: string[];
}

export interface CorrectionOutcome extends CorrectionResult {
  /**
   * Whether the engine's earlier answer was reported to calibration
   */
  calibrated: boolean;
}

export class UnknownSubjectError extends Error {
  constructor(public subjectId: string) {
    super(`No record for subject ${subjectId}`);
    this.name = 'UnknownSubjectError';
  }
}

const CSV_COLUMNS = [
  'subject_id',
  'material',
  'type',
  'confidence',
  'source_kind',
  'timestamp',
  'verified',
  'correction_count',
  'photo_hash',
] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * One header line plus one line per record
 */
export function recordsToCsv(records: SubjectRecord[]): string {
  const rows = records.map(record =>
    [
      record.subjectId,
      record.material,
      record.type,
      String(record.confidence),
      record.sourceKind,
      new Date(record.timestamp).toISOString(),
      record.verified ? 'true' : 'false',
      String(record.correctionCount),
      record.photoHash ?? '',
    ]
      .map(csvField)
      .join(',')
  );
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}

export class ClassificationService {
  constructor(
    private readonly store: AnalysisStore,
    private readonly engine: EnsembleDecisionEngine,
    private readonly calibration: CalibrationService
  ) {}

  decide(subjectId: string, options: DecideOptions = {}): Promise<Decision> {
    return this.engine.decide(subjectId, options);
  }

  decideMany(subjectIds: readonly string[], options: DecideManyOptions = {}): Promise<Decision[]> {
    return this.engine.decideMany(subjectIds, options);
  }

  async getRecord(subjectId: string): Promise<SubjectRecord> {
    const record = await this.store.getAnalysis(subjectId);
    if (!record) {
      throw new UnknownSubjectError(subjectId);
    }
    return record;
  }

  /**
   * Record a human correction. Store faults propagate; when the subject
   * carried an unverified engine answer, its outcome feeds calibration.
   */
  async correct(subjectId: string, material: Material, type: PoleType): Promise<CorrectionOutcome> {
    const result = await this.store.applyCorrection(subjectId, material, type);
    const previous = result.previous;

    if (!previous || previous.verified) {
      return { ...result, calibrated: false };
    }

    const wasCorrect = previous.material === material && previous.type === type;
    try {
      await this.calibration.recordOutcome(previous.confidence, wasCorrect, result.event.timestamp);
      return { ...result, calibrated: true };
    } catch (error) {
      logger.warn(`Could not record calibration outcome for subject ${subjectId}`, error);
      return { ...result, calibrated: false };
    }
  }

  /**
   * Accept the stored answer as correct
   */
  async confirm(subjectId: string): Promise<CorrectionOutcome> {
    const record = await this.getRecord(subjectId);
    return this.correct(subjectId, record.material, record.type);
  }

  async calibrationSummary(confusionLimit: number = 5): Promise<CalibrationSummary> {
    const corrections = await this.store.listCorrections();
    return {
      bins: this.calibration.calibrationReport(),
      confusions: {
        material: this.calibration.topConfusions('material', confusionLimit, corrections),
        type: this.calibration.topConfusions('type', confusionLimit, corrections),
      },
      trend: this.calibration.accuracyTrend(),
      hints: this.calibration.promptHints(corrections),
    };
  }

  async topConfusions(axis: ConfusionAxis, n: number): Promise<ConfusionTally[]> {
    return this.calibration.topConfusions(axis, n, await this.store.listCorrections());
  }

  accuracyTrend(): AccuracyTrend {
    return this.calibration.accuracyTrend();
  }

  /**
   * Instruction hints for the vision oracle from the current correction log
   */
  async promptHints(): Promise<string[]> {
    return this.calibration.promptHints(await this.store.listCorrections());
  }

  async exportSnapshot(format: ExportFormat = 'json'): Promise<string> {
    const records = await this.store.exportSnapshot();
    logger.debug(`Exporting ${records.length} records as ${format}`);
    return format === 'csv' ? recordsToCsv(records) : JSON.stringify(records, null, 2);
  }

  accuracyStats(): Promise<AccuracyStats> {
    return this.store.getAccuracyStats();
  }
}
