/**
 * A calibration outcome: how confident a prediction was and whether a
 * human later agreed with it
 */
export interface OutcomeRecord {
  predictedConfidence: number;
  wasCorrect: boolean;
  timestamp: number;
}

/**
 * Outcomes for one decile confidence level (0, 10, ..., 100)
 */
export interface CalibrationBin {
  level: number;
  total: number;
  correct: number;
}

export type BinJudgement = 'overconfident' | 'underconfident' | 'calibrated' | 'insufficient';

export interface BinReport extends CalibrationBin {
  accuracy: number;
  calibrationError: number;
  judgement: BinJudgement;
}

export type ConfusionAxis = 'material' | 'type';

/**
 * How often `before` was corrected to `after` on one axis
 */
export interface ConfusionTally {
  axis: ConfusionAxis;
  before: string;
  after: string;
  count: number;
  lastSeen: number;
}

/**
 * Running accuracy after each recorded outcome
 */
export interface AccuracySnapshot {
  timestamp: number;
  accuracy: number;
}

export type AccuracyTrend = 'improving' | 'declining' | 'stable';

/**
 * Durable, append-only log of calibration outcomes
 */
export interface OutcomeLog {
  init(): Promise<void>;
  append(outcome: OutcomeRecord): Promise<void>;

  /**
   * Every outcome in insertion order
   */
  readAll(): Promise<OutcomeRecord[]>;
}
