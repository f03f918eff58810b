import type { BucketType, LearnedPrediction, PatternHypothesis } from '../types/classification.js';

/**
 * Cheap deterministic functions of a numeric subject id, used as proxy
 * features for pattern learning when no photograph is available.
 * Order matters: it breaks ties between equally confident buckets.
 */
export const BUCKET_FUNCTIONS: ReadonlyArray<{ type: BucketType; apply: (id: number) => number }> = [
  { type: 'mod10', apply: id => floorMod(id, 10) },
  { type: 'mod15', apply: id => floorMod(id, 15) },
  { type: 'mod20', apply: id => floorMod(id, 20) },
  { type: 'div50', apply: id => Math.floor(id / 50) },
  { type: 'div100', apply: id => Math.floor(id / 100) },
];

/**
 * Sample count at which a hypothesis earns its full success rate
 */
export const FULL_TRUST_SAMPLES = 10;

export interface BucketKey {
  bucketType: BucketType;
  bucketValue: number;
}

export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Parse a subject id as an integer; anything else yields null
 */
export function parseNumericId(subjectId: string): number | null {
  const trimmed = subjectId.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Bucket keys for a subject id; empty for non-numeric ids
 */
export function bucketsFor(subjectId: string): BucketKey[] {
  const id = parseNumericId(subjectId);
  if (id === null) {
    return [];
  }
  return BUCKET_FUNCTIONS.map(fn => ({ bucketType: fn.type, bucketValue: fn.apply(id) }));
}

/**
 * Confidence a hypothesis lends to a prediction: its share of the bucket,
 * discounted until it has seen enough samples
 */
export function derivedConfidence(hypothesis: Pick<PatternHypothesis, 'successRate' | 'sampleCount'>): number {
  return hypothesis.successRate * Math.min(hypothesis.sampleCount / FULL_TRUST_SAMPLES, 1.0);
}

/**
 * The hypothesis a bucket currently stands behind: most samples, then higher success rate
 */
export function bucketLeader(hypotheses: PatternHypothesis[]): PatternHypothesis | null {
  let leader: PatternHypothesis | null = null;
  for (const hypothesis of hypotheses) {
    if (
      !leader ||
      hypothesis.sampleCount > leader.sampleCount ||
      (hypothesis.sampleCount === leader.sampleCount && hypothesis.successRate > leader.successRate)
    ) {
      leader = hypothesis;
    }
  }
  return leader;
}

/**
 * Pick the most confident prediction across bucket leaders.
 * `candidates` must follow BUCKET_FUNCTIONS order.
 */
export function bestLearnedPrediction(candidates: PatternHypothesis[]): LearnedPrediction | null {
  let best: LearnedPrediction | null = null;
  for (const hypothesis of candidates) {
    const confidence = derivedConfidence(hypothesis);
    if (!best || confidence > best.confidence) {
      best = {
        material: hypothesis.material,
        type: hypothesis.type,
        confidence,
        bucketType: hypothesis.bucketType,
        bucketValue: hypothesis.bucketValue,
        sampleCount: hypothesis.sampleCount,
      };
    }
  }
  return best;
}
