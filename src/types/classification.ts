/**
 * Classification Types for the pole classifier
 */

/**
 * Open label vocabularies, e.g. "kov" or "betón"
 */
export type Material = string;
export type PoleType = string;

/**
 * Provenance of an observation or of the last write to a subject record
 */
export type SourceKind =
  | 'verified_refresh'
  | 'aggregator'
  | 'pattern_learned'
  | 'stored_prior'
  | 'rule_based'
  | 'ensemble'
  | 'human_correction'
  | 'imported'
  | 'fallback';

/**
 * Kinds of observation that take part in ensemble voting
 */
export type ObservationKind = Extract<
  SourceKind,
  'verified_refresh' | 'aggregator' | 'pattern_learned' | 'stored_prior' | 'rule_based'
>;

export interface Classification {
  material: Material;
  type: PoleType;
  confidence: number;
}

/**
 * One source's proposal for one decision. Never persisted.
 */
export interface Observation extends Classification {
  sourceKind: ObservationKind;
  weight: number;
}

export interface SubjectRecord extends Classification {
  subjectId: string;
  sourceKind: SourceKind;
  /** Epoch milliseconds */
  timestamp: number;
  verified: boolean;
  correctionCount: number;
  photoHash?: string;
}

export interface CorrectionEvent {
  id: string;
  subjectId: string;
  materialBefore: Material;
  typeBefore: PoleType;
  materialAfter: Material;
  typeAfter: PoleType;
  sourceKindBefore: SourceKind;
  timestamp: number;
}

export type BucketType = 'mod10' | 'mod15' | 'mod20' | 'div50' | 'div100';

export interface PatternHypothesis {
  bucketType: BucketType;
  bucketValue: number;
  material: Material;
  type: PoleType;
  sampleCount: number;
  successRate: number;
  lastUpdated: number;
}

/**
 * Best learned guess for a subject, with the hypothesis it came from
 */
export interface LearnedPrediction extends Classification {
  bucketType: BucketType;
  bucketValue: number;
  sampleCount: number;
}

export interface CorrectionResult {
  event: CorrectionEvent;
  previous: SubjectRecord | null;
  record: SubjectRecord;
  /** Number of pattern hypotheses touched; 0 for non-numeric ids */
  hypothesesUpdated: number;
}

export interface Decision extends Classification {
  subjectId: string;
  /** Observation kinds that contributed to the vote */
  sources: ObservationKind[];
  /** True when the decision is the configured fallback */
  fallback: boolean;
  /** True when a verified record short-circuited the vote */
  verified: boolean;
}

export interface SourceAccuracy {
  sourceKind: SourceKind;
  count: number;
  avgConfidence: number;
}

export interface AccuracyStats {
  totalAnalyzed: number;
  verifiedCount: number;
  correctionCount: number;
  accuracyRate: number;
  bySource: SourceAccuracy[];
}
