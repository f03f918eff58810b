import type { Decision, Observation, SubjectRecord } from '../types/classification.js';
import type { AnalysisStore } from '../storage/AnalysisStore.js';
import type { DecideManyOptions, DecideOptions, ObservationContext, ObservationSource, SourceObservation } from './types.js';
import { applyAgreementBonus, clampConfidence, weightedVote } from './weightedVote.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/EngineConfig.js';
import { logger } from '../utils/logger.js';

/**
 * Combines independent, individually unreliable sources into one decision
 * per subject.
 *
 * A verified record answers directly unless a refresh is forced. Otherwise
 * every source is asked concurrently, the answers are weighted by the
 * reliability table and voted per axis, and agreement between several
 * sources raises the confidence. Confident decisions are cached as
 * unverified records on a best-effort basis; the store refuses the write
 * when the subject was verified while the sources were answering.
 *
 * `decide` never rejects.
 */
export class EnsembleDecisionEngine {
  constructor(
    private readonly store: AnalysisStore,
    private readonly sources: readonly ObservationSource[],
    private readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  async decide(subjectId: string, options: DecideOptions = {}): Promise<Decision> {
    const forceRefresh = options.forceRefresh ?? false;

    const prior = await this.readPrior(subjectId);
    if (prior?.verified && !forceRefresh) {
      return {
        subjectId,
        material: prior.material,
        type: prior.type,
        confidence: 1.0,
        sources: [],
        fallback: false,
        verified: true,
      };
    }

    const observations = await this.gather({ subjectId, forceRefresh, prior });

    const vote = weightedVote(observations);
    if (!vote) {
      logger.info(`No observations for subject ${subjectId}; using fallback`);
      return {
        subjectId,
        material: this.config.fallback.material,
        type: this.config.fallback.type,
        confidence: clampConfidence(this.config.fallback.confidence),
        sources: [],
        fallback: true,
        verified: false,
      };
    }

    const confidence = applyAgreementBonus(vote.confidence, observations.length, {
      step: this.config.agreementStep,
      cap: this.config.agreementCap,
      max: this.config.maxConfidence,
    });

    const decision: Decision = {
      subjectId,
      material: vote.material,
      type: vote.type,
      confidence,
      sources: observations.map(o => o.sourceKind),
      fallback: false,
      verified: false,
    };

    logger.debug(`Decided subject ${subjectId}`, {
      material: decision.material,
      type: decision.type,
      confidence: Number(confidence.toFixed(3)),
      sources: decision.sources,
    });

    // a forced refresh never downgrades a verified record
    if (confidence >= this.config.cacheWriteThreshold && !prior?.verified) {
      await this.cacheDecision(decision, observations);
    }

    return decision;
  }

  /**
   * Decide subjects in order, at most `concurrency` at a time.
   * Once the signal aborts no new decision starts; finished ones are returned in input order.
   */
  async decideMany(subjectIds: readonly string[], options: DecideManyOptions = {}): Promise<Decision[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const results: Array<Decision | undefined> = new Array(subjectIds.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < subjectIds.length && !options.signal?.aborted) {
        const index = next++;
        results[index] = await this.decide(subjectIds[index], { forceRefresh: options.forceRefresh });
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, subjectIds.length) }, () => worker()));

    const decided = results.filter((d): d is Decision => d !== undefined);
    if (decided.length < subjectIds.length) {
      logger.info(`Batch stopped after ${decided.length} of ${subjectIds.length} subjects`);
    }
    return decided;
  }

  private async readPrior(subjectId: string): Promise<SubjectRecord | null> {
    try {
      return await this.store.getAnalysis(subjectId);
    } catch (error) {
      logger.warn(`Could not read stored record for subject ${subjectId}`, error);
      return null;
    }
  }

  private async gather(context: ObservationContext): Promise<Array<Observation & { photoHash?: string }>> {
    const settled = await Promise.allSettled(this.sources.map(async source => source.observe(context)));

    const observations: Array<Observation & { photoHash?: string }> = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        logger.warn(`Source ${this.sources[index].name} unavailable for subject ${context.subjectId}`, outcome.reason);
        return;
      }
      if (outcome.value) {
        observations.push(this.weigh(outcome.value));
      }
    });
    return observations;
  }

  private weigh(observation: SourceObservation): Observation & { photoHash?: string } {
    return {
      ...observation,
      confidence: clampConfidence(observation.confidence),
      weight: this.config.weights[observation.sourceKind],
    };
  }

  private async cacheDecision(decision: Decision, observations: ReadonlyArray<{ photoHash?: string }>): Promise<void> {
    const record: SubjectRecord = {
      subjectId: decision.subjectId,
      material: decision.material,
      type: decision.type,
      confidence: decision.confidence,
      sourceKind: 'ensemble',
      timestamp: this.now(),
      verified: false,
      correctionCount: 0,
    };
    const photoHash = observations.find(o => o.photoHash)?.photoHash;
    if (photoHash) {
      record.photoHash = photoHash;
    }

    try {
      const written = await this.store.cacheAnalysis(record);
      if (!written) {
        logger.info(`Subject ${decision.subjectId} was verified meanwhile; decision not cached`);
      }
    } catch (error) {
      logger.warn(`Could not cache decision for subject ${decision.subjectId}`, error);
    }
  }
}
