import type { CorrectionEvent } from '../types/classification.js';
import type {
  AccuracySnapshot,
  AccuracyTrend,
  BinJudgement,
  BinReport,
  CalibrationBin,
  ConfusionAxis,
  ConfusionTally,
  OutcomeLog,
  OutcomeRecord,
} from './types.js';
import { logger } from '../utils/logger.js';

export interface CalibrationOptions {
  /**
   * Gap between stated confidence and observed accuracy that marks a bin as miscalibrated
   */
  driftMargin?: number;

  /**
   * Bins with fewer outcomes are not judged
   */
  minBinSamples?: number;

  /**
   * Snapshots per comparison window for the accuracy trend
   */
  trendWindow?: number;

  trendThreshold?: number;

  now?: () => number;
}

const DEFAULTS = {
  driftMargin: 0.2,
  minBinSamples: 5,
  trendWindow: 10,
  trendThreshold: 0.05,
};

const MAX_CONFUSION_HINTS = 3;

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Round half to even: 2.5 → 2, 3.5 → 4
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Decile level (0..100) a confidence is filed under. The confidence is
 * rounded to one decimal by its exact binary value, so 0.15 (stored just
 * below) files under 10 and 0.45 (just above) under 50. Only 0.25 and 0.75
 * are exact halves; they go to the even decile.
 */
export function binLevel(confidence: number): number {
  const value = clamp01(confidence);
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 === 1) {
    return roundHalfEven(value * 10) * 10;
  }
  return Math.round(Number(value.toFixed(1)) * 10) * 10;
}

export function calibrationError(bin: CalibrationBin): number {
  if (bin.total === 0) return 0;
  return Math.abs(bin.correct / bin.total - bin.level / 100);
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Tracks how well stated confidence matches reality and which labels
 * humans keep correcting.
 *
 * Bins and snapshots live in memory and are rebuilt from the outcome log
 * on `load()`. Confusions are a projection of the correction log and are
 * recomputed on every call.
 */
export class CalibrationService {
  private readonly bins = new Map<number, CalibrationBin>();
  private readonly snapshots: AccuracySnapshot[] = [];
  private totalSoFar = 0;
  private correctSoFar = 0;
  private readonly options: Required<Omit<CalibrationOptions, 'now'>>;
  private readonly now: () => number;

  constructor(
    private readonly log: OutcomeLog,
    options: CalibrationOptions = {}
  ) {
    this.options = {
      driftMargin: options.driftMargin ?? DEFAULTS.driftMargin,
      minBinSamples: options.minBinSamples ?? DEFAULTS.minBinSamples,
      trendWindow: options.trendWindow ?? DEFAULTS.trendWindow,
      trendThreshold: options.trendThreshold ?? DEFAULTS.trendThreshold,
    };
    this.now = options.now ?? Date.now;
  }

  /**
   * Initialize the log and replay every stored outcome
   */
  async load(): Promise<void> {
    await this.log.init();
    const outcomes = await this.log.readAll();
    this.bins.clear();
    this.snapshots.length = 0;
    this.totalSoFar = 0;
    this.correctSoFar = 0;
    for (const outcome of outcomes) {
      this.apply(outcome);
    }
    logger.debug(`Calibration state rebuilt from ${outcomes.length} outcomes`);
  }

  async recordOutcome(predictedConfidence: number, wasCorrect: boolean, timestamp?: number): Promise<CalibrationBin> {
    const outcome: OutcomeRecord = {
      predictedConfidence: clamp01(predictedConfidence),
      wasCorrect,
      timestamp: timestamp ?? this.now(),
    };
    await this.log.append(outcome);
    return { ...this.apply(outcome) };
  }

  judgeBin(bin: CalibrationBin): BinJudgement {
    if (bin.total < this.options.minBinSamples) {
      return 'insufficient';
    }
    const stated = bin.level / 100;
    const accuracy = bin.correct / bin.total;
    if (stated - accuracy > this.options.driftMargin) {
      return 'overconfident';
    }
    if (accuracy - stated > this.options.driftMargin) {
      return 'underconfident';
    }
    return 'calibrated';
  }

  /**
   * Every populated bin, lowest level first
   */
  calibrationReport(): BinReport[] {
    return [...this.bins.values()]
      .sort((a, b) => a.level - b.level)
      .map(bin => ({
        ...bin,
        accuracy: bin.total > 0 ? bin.correct / bin.total : 0,
        calibrationError: calibrationError(bin),
        judgement: this.judgeBin(bin),
      }));
  }

  getBin(level: number): CalibrationBin | null {
    const bin = this.bins.get(level);
    return bin ? { ...bin } : null;
  }

  /**
   * The `n` most frequent real corrections on one axis; ties go to the most recent
   */
  topConfusions(axis: ConfusionAxis, n: number, corrections: CorrectionEvent[]): ConfusionTally[] {
    const tallies = new Map<string, ConfusionTally>();

    for (const event of corrections) {
      if (event.materialBefore === event.materialAfter && event.typeBefore === event.typeAfter) {
        continue;
      }
      const before = axis === 'material' ? event.materialBefore : event.typeBefore;
      const after = axis === 'material' ? event.materialAfter : event.typeAfter;
      if (before === after) {
        continue;
      }

      const key = JSON.stringify([before, after]);
      const tally = tallies.get(key);
      if (tally) {
        tally.count += 1;
        tally.lastSeen = Math.max(tally.lastSeen, event.timestamp);
      } else {
        tallies.set(key, { axis, before, after, count: 1, lastSeen: event.timestamp });
      }
    }

    return [...tallies.values()]
      .sort((a, b) => b.count - a.count || b.lastSeen - a.lastSeen)
      .slice(0, Math.max(0, n));
  }

  accuracyTrend(): AccuracyTrend {
    const window = this.options.trendWindow;
    if (this.snapshots.length < window * 2) {
      return 'stable';
    }
    const recent = this.snapshots.slice(-window).map(s => s.accuracy);
    const previous = this.snapshots.slice(-window * 2, -window).map(s => s.accuracy);
    const delta = mean(recent) - mean(previous);
    if (delta > this.options.trendThreshold) return 'improving';
    if (delta < -this.options.trendThreshold) return 'declining';
    return 'stable';
  }

  getSnapshots(): AccuracySnapshot[] {
    return this.snapshots.map(s => ({ ...s }));
  }

  /**
   * Instruction addenda for the vision oracle, built from frequent
   * confusions and overconfident bins
   */
  promptHints(corrections: CorrectionEvent[]): string[] {
    const hints: string[] = [];

    for (const axis of ['material', 'type'] as const) {
      for (const tally of this.topConfusions(axis, MAX_CONFUSION_HINTS, corrections)) {
        hints.push(
          `Common mistake: do not confuse ${axis} "${tally.before}" with "${tally.after}" ` +
            `(corrected ${tally.count} times).`
        );
      }
    }

    if (this.calibrationReport().some(bin => bin.judgement === 'overconfident')) {
      hints.push(
        'Confidence calibration: past answers were overconfident. ' +
          'Report confidence above 0.8 only when the visual evidence is unambiguous.'
      );
    }

    return hints;
  }

  private apply(outcome: OutcomeRecord): CalibrationBin {
    const level = binLevel(outcome.predictedConfidence);
    let bin = this.bins.get(level);
    if (!bin) {
      bin = { level, total: 0, correct: 0 };
      this.bins.set(level, bin);
    }
    bin.total += 1;
    if (outcome.wasCorrect) {
      bin.correct += 1;
    }

    this.totalSoFar += 1;
    if (outcome.wasCorrect) {
      this.correctSoFar += 1;
    }
    this.snapshots.push({ timestamp: outcome.timestamp, accuracy: this.correctSoFar / this.totalSoFar });
    return bin;
  }
}
