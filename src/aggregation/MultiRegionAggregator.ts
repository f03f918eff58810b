/**
 * Multi-Region Aggregator
 *
 * Sends several crops of one photograph to the vision oracle and merges
 * the replies by confidence-weighted majority, so one mis-focused crop
 * cannot decide the answer on its own.
 *
 * 1. All region calls run concurrently; voting waits until every call settles
 * 2. Failed, timed-out, unparseable and low-confidence replies are discarded
 * 3. Survivors vote with their own confidence as weight
 */

import type { Material, PoleType } from '../types/classification.js';
import type { OracleReply, Photograph, PhotoSource, RegionSpec, VisionOracle } from '../vision/types.js';
import { REGION_CATALOGUE } from '../vision/regions.js';
import { buildInstruction } from '../vision/instructions.js';
import { parseOracleReply } from '../vision/replyParser.js';
import { weightedVote } from '../engine/weightedVote.js';
import { type AggregatorConfig, DEFAULT_AGGREGATOR_CONFIG, DEFAULT_FALLBACK } from '../config/EngineConfig.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type RegionStatus = 'accepted' | 'low_confidence' | 'parse_failure' | 'failed' | 'timeout';

export interface RegionResult {
  region: RegionSpec['name'];
  status: RegionStatus;
  reply?: OracleReply;
  rawReply?: string;
  error?: string;
  processingTimeMs: number;
}

export interface AggregationResult {
  material: Material;
  type: PoleType;
  confidence: number;
  regionResults: RegionResult[];
  survivors: number;
  /**
   * True when every region was discarded
   */
  fallback: boolean;
}

export interface AggregatorOptions extends Partial<AggregatorConfig> {
  regions?: readonly RegionSpec[];
  fallbackMaterial?: Material;
  fallbackType?: PoleType;
}

export class OracleTimeoutError extends Error {
  constructor(region: string, timeoutMs: number) {
    super(`Oracle call for region ${region} timed out after ${timeoutMs}ms`);
    this.name = 'OracleTimeoutError';
  }
}

// ============================================================================
// Aggregator
// ============================================================================

export class MultiRegionAggregator {
  private readonly config: AggregatorConfig;
  private readonly regions: readonly RegionSpec[];
  private readonly fallbackMaterial: Material;
  private readonly fallbackType: PoleType;

  constructor(
    private readonly oracle: VisionOracle,
    private readonly photos: PhotoSource,
    options: AggregatorOptions = {}
  ) {
    this.config = {
      discardThreshold: options.discardThreshold ?? DEFAULT_AGGREGATOR_CONFIG.discardThreshold,
      fallbackConfidence: options.fallbackConfidence ?? DEFAULT_AGGREGATOR_CONFIG.fallbackConfidence,
      oracleTimeoutMs: options.oracleTimeoutMs ?? DEFAULT_AGGREGATOR_CONFIG.oracleTimeoutMs,
    };
    this.regions = options.regions ?? REGION_CATALOGUE;
    this.fallbackMaterial = options.fallbackMaterial ?? DEFAULT_FALLBACK.material;
    this.fallbackType = options.fallbackType ?? DEFAULT_FALLBACK.type;
  }

  /**
   * Analyze every region of the photograph and merge the surviving replies
   */
  async aggregate(photo: Photograph, hints: readonly string[] = []): Promise<AggregationResult> {
    logger.debug(`Aggregating ${this.regions.length} regions for subject ${photo.subjectId}`);

    const settled = await Promise.allSettled(this.regions.map(region => this.analyzeRegion(photo, region, hints)));

    const regionResults: RegionResult[] = settled.map((outcome, index) =>
      outcome.status === 'fulfilled'
        ? outcome.value
        : {
            region: this.regions[index].name,
            status: 'failed',
            error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
            processingTimeMs: 0,
          }
    );

    const survivors = regionResults.flatMap(result =>
      result.status === 'accepted' && result.reply ? [result.reply] : []
    );

    const vote = weightedVote(
      survivors.map(reply => ({
        material: reply.material,
        type: reply.type,
        confidence: reply.confidence,
        weight: reply.confidence,
      }))
    );

    if (!vote) {
      logger.warn(`All ${regionResults.length} regions discarded for subject ${photo.subjectId}; using fallback`);
      return {
        material: this.fallbackMaterial,
        type: this.fallbackType,
        confidence: this.config.fallbackConfidence,
        regionResults,
        survivors: 0,
        fallback: true,
      };
    }

    logger.info(`Aggregated subject ${photo.subjectId}`, {
      survivors: survivors.length,
      material: vote.material,
      type: vote.type,
      confidence: Number(vote.confidence.toFixed(3)),
    });

    return {
      material: vote.material,
      type: vote.type,
      confidence: vote.confidence,
      regionResults,
      survivors: survivors.length,
      fallback: false,
    };
  }

  /**
   * Crop, query and parse one region. Never rejects.
   */
  private async analyzeRegion(photo: Photograph, region: RegionSpec, hints: readonly string[]): Promise<RegionResult> {
    const startTime = Date.now();
    let rawReply: string;

    try {
      const crop = await this.photos.crop(photo, region);
      const instruction = buildInstruction(region, hints);
      rawReply = await this.withTimeout(signal => this.oracle.analyze(crop, instruction, signal), region.name);
    } catch (error) {
      const status: RegionStatus = error instanceof OracleTimeoutError ? 'timeout' : 'failed';
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Region ${region.name} ${status} for subject ${photo.subjectId}: ${message}`);
      return { region: region.name, status, error: message, processingTimeMs: Date.now() - startTime };
    }

    const processingTimeMs = Date.now() - startTime;
    const reply = parseOracleReply(rawReply);
    if (!reply) {
      logger.debug(`Region ${region.name} reply could not be parsed`);
      return { region: region.name, status: 'parse_failure', rawReply, processingTimeMs };
    }
    if (reply.confidence <= this.config.discardThreshold) {
      return { region: region.name, status: 'low_confidence', reply, rawReply, processingTimeMs };
    }
    return { region: region.name, status: 'accepted', reply, rawReply, processingTimeMs };
  }

  /**
   * Race the call against the oracle timeout and abort the call when the
   * timeout wins
   */
  private async withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, region: string): Promise<T> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new OracleTimeoutError(region, this.config.oracleTimeoutMs));
        controller.abort();
      }, this.config.oracleTimeoutMs);
    });
    try {
      return await Promise.race([work(controller.signal), timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
