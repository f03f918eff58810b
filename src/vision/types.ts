/**
 * Vision collaborators: the oracle that looks at pole photographs and the
 * source that supplies them
 */

import type { Material, PoleType } from '../types/classification.js';

export type RegionName =
  | 'full'
  | 'upper-junction'
  | 'main-junction'
  | 'lower-junction'
  | 'center-shaft'
  | 'upper-section'
  | 'base-section';

/**
 * Fractions of the photograph's width and height
 */
export interface FractionalBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface RegionSpec {
  name: RegionName;
  box: FractionalBox;
  /**
   * Sentence appended to the instruction for this region
   */
  focus: string;
}

/**
 * Loaded photograph of one subject
 */
export interface Photograph {
  subjectId: string;
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
  /**
   * Content hash (sha256, hex prefix)
   */
  hash: string;
}

/**
 * A crop of a photograph, ready to send to the oracle
 */
export interface ImageRegion {
  name: RegionName;
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
}

/**
 * Parsed oracle answer
 */
export interface OracleReply {
  material: Material;
  type: PoleType;
  confidence: number;
  rationale: string;
}

/**
 * External multimodal model. Returns the raw reply text; callers parse it.
 * Aborting the signal cancels the call.
 */
export interface VisionOracle {
  readonly name: string;
  analyze(region: ImageRegion, instruction: string, signal?: AbortSignal): Promise<string>;
}

export interface PhotoSource {
  /**
   * null when no photograph exists for the subject
   */
  getPhotograph(subjectId: string): Promise<Photograph | null>;
  crop(photo: Photograph, region: RegionSpec): Promise<ImageRegion>;
}

export type VisionProviderType = 'openai' | 'anthropic' | 'ollama';

export interface VisionModelOptions {
  timeout?: number;
  maxRetries?: number;
  maxTokens?: number;
  temperature?: number;
  requestsPerMinute?: number;
}

export interface VisionModelConfig {
  provider: VisionProviderType;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  description?: string;
  options?: VisionModelOptions;
}

export interface VisionModelsConfigFile {
  default: string;
  models: Record<string, VisionModelConfig>;
}
