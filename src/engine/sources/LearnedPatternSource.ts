import type { AnalysisStore } from '../../storage/AnalysisStore.js';
import type { ObservationContext, ObservationSource, SourceObservation } from '../types.js';

/**
 * Best pattern hypothesis for the subject's numeric id buckets
 */
export class LearnedPatternSource implements ObservationSource {
  readonly name = 'learned-pattern';

  constructor(private readonly store: AnalysisStore) {}

  async observe(context: ObservationContext): Promise<SourceObservation | null> {
    const prediction = await this.store.queryLearnedPrediction(context.subjectId);
    if (!prediction || prediction.confidence <= 0) {
      return null;
    }
    return {
      material: prediction.material,
      type: prediction.type,
      confidence: prediction.confidence,
      sourceKind: 'pattern_learned',
    };
  }
}
