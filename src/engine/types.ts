import type { Classification, ObservationKind, SubjectRecord } from '../types/classification.js';

/**
 * What a source knows about the subject being decided
 */
export interface ObservationContext {
  subjectId: string;
  forceRefresh: boolean;
  /**
   * Stored record read at the start of the decision, if any
   */
  prior: SubjectRecord | null;
}

/**
 * A source's proposal before the engine assigns its weight
 */
export interface SourceObservation extends Classification {
  sourceKind: ObservationKind;
  photoHash?: string;
}

/**
 * Independent, possibly failing producer of at most one observation
 */
export interface ObservationSource {
  readonly name: string;
  /**
   * null when the source has nothing to say; rejects on failure
   */
  observe(context: ObservationContext): Promise<SourceObservation | null>;
}

export interface DecideOptions {
  forceRefresh?: boolean;
}

export interface DecideManyOptions extends DecideOptions {
  /**
   * Stops issuing new decisions once aborted; in-flight ones complete
   */
  signal?: AbortSignal;
  concurrency?: number;
}
