import type { ObservationContext, ObservationSource, SourceObservation } from '../types.js';

/**
 * The subject's stored record. Verified records only vote under a forced
 * refresh, where they carry the highest weight.
 */
export class PriorRecordSource implements ObservationSource {
  readonly name = 'prior-record';

  async observe({ prior, forceRefresh }: ObservationContext): Promise<SourceObservation | null> {
    if (!prior) {
      return null;
    }
    if (prior.verified) {
      return forceRefresh
        ? { material: prior.material, type: prior.type, confidence: prior.confidence, sourceKind: 'verified_refresh' }
        : null;
    }
    return {
      material: prior.material,
      type: prior.type,
      confidence: prior.confidence,
      sourceKind: 'stored_prior',
      photoHash: prior.photoHash,
    };
  }
}
