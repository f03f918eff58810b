import type { MultiRegionAggregator } from '../../aggregation/MultiRegionAggregator.js';
import type { PhotoSource } from '../../vision/types.js';
import type { ObservationContext, ObservationSource, SourceObservation } from '../types.js';

/**
 * Multi-region analysis of the subject's photograph, when one exists
 */
export class AggregatorSource implements ObservationSource {
  readonly name = 'aggregator';

  constructor(
    private readonly photos: PhotoSource,
    private readonly aggregator: MultiRegionAggregator,
    private readonly hints: () => Promise<string[]> = async () => []
  ) {}

  async observe(context: ObservationContext): Promise<SourceObservation | null> {
    const photo = await this.photos.getPhotograph(context.subjectId);
    if (!photo) {
      return null;
    }
    const result = await this.aggregator.aggregate(photo, await this.hints());
    return {
      material: result.material,
      type: result.type,
      confidence: result.confidence,
      sourceKind: 'aggregator',
      photoHash: photo.hash,
    };
  }
}
