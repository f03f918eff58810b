/**
 * Row shapes shared by the SQL-backed stores and their mappers.
 * PostgreSQL returns BIGINT and COUNT(*) as strings, hence `number | string`.
 */

import type {
  BucketType,
  CorrectionEvent,
  PatternHypothesis,
  SourceKind,
  SubjectRecord,
} from '../types/classification.js';

type Numeric = number | string;

export interface SubjectRow {
  subject_id: string;
  material: string;
  type: string;
  confidence: Numeric;
  source_kind: string;
  timestamp: Numeric;
  verified: number | boolean;
  correction_count: Numeric;
  photo_hash: string | null;
}

export interface CorrectionRow {
  id: string;
  subject_id: string;
  material_before: string;
  type_before: string;
  material_after: string;
  type_after: string;
  source_kind_before: string;
  timestamp: Numeric;
}

export interface HypothesisRow {
  bucket_type: string;
  bucket_value: Numeric;
  material: string;
  type: string;
  sample_count: Numeric;
  success_rate: Numeric;
  last_updated: Numeric;
}

export interface SourceStatsRow {
  source_kind: string;
  count: Numeric;
  avg_confidence: Numeric;
}

const SOURCE_KINDS: readonly SourceKind[] = [
  'verified_refresh',
  'aggregator',
  'pattern_learned',
  'stored_prior',
  'rule_based',
  'ensemble',
  'human_correction',
  'imported',
  'fallback',
];

const BUCKET_TYPES: readonly BucketType[] = ['mod10', 'mod15', 'mod20', 'div50', 'div100'];

export function toSourceKind(value: string): SourceKind {
  return SOURCE_KINDS.find(kind => kind === value) ?? 'imported';
}

function toBucketType(value: string): BucketType | null {
  return BUCKET_TYPES.find(type => type === value) ?? null;
}

export function rowToRecord(row: SubjectRow): SubjectRecord {
  const record: SubjectRecord = {
    subjectId: row.subject_id,
    material: row.material,
    type: row.type,
    confidence: Number(row.confidence),
    sourceKind: toSourceKind(row.source_kind),
    timestamp: Number(row.timestamp),
    verified: row.verified === true || row.verified === 1,
    correctionCount: Number(row.correction_count),
  };
  if (row.photo_hash) {
    record.photoHash = row.photo_hash;
  }
  return record;
}

export function rowToCorrection(row: CorrectionRow): CorrectionEvent {
  return {
    id: row.id,
    subjectId: row.subject_id,
    materialBefore: row.material_before,
    typeBefore: row.type_before,
    materialAfter: row.material_after,
    typeAfter: row.type_after,
    sourceKindBefore: toSourceKind(row.source_kind_before),
    timestamp: Number(row.timestamp),
  };
}

export function rowToHypothesis(row: HypothesisRow): PatternHypothesis | null {
  const bucketType = toBucketType(row.bucket_type);
  if (!bucketType) {
    return null;
  }
  return {
    bucketType,
    bucketValue: Number(row.bucket_value),
    material: row.material,
    type: row.type,
    sampleCount: Number(row.sample_count),
    successRate: Number(row.success_rate),
    lastUpdated: Number(row.last_updated),
  };
}

export function rowsToHypotheses(rows: HypothesisRow[]): PatternHypothesis[] {
  return rows.map(rowToHypothesis).filter((h): h is PatternHypothesis => h !== null);
}
