import type { Classification, ObservationKind } from '../types/classification.js';

/**
 * Raised when configuration values are missing or inconsistent
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reliability weight per observation kind.
 * Only the ordering is a contract; the numbers are tuning knobs.
 */
export type ReliabilityWeights = Record<ObservationKind, number>;

/**
 * Configuration for the ensemble decision engine
 */
export interface EngineConfig {
  weights: ReliabilityWeights;

  /**
   * Returned when no observation could be gathered
   */
  fallback: Classification;

  /**
   * Decisions at or above this confidence are cached as unverified records
   */
  cacheWriteThreshold: number;

  /**
   * Bonus per extra contributing observation
   */
  agreementStep: number;

  /**
   * Upper bound on the total agreement bonus
   */
  agreementCap: number;

  /**
   * Confidence ceiling after the agreement bonus
   */
  maxConfidence: number;
}

/**
 * Configuration for the multi-region aggregator
 */
export interface AggregatorConfig {
  /**
   * Replies at or below this confidence are discarded
   */
  discardThreshold: number;

  /**
   * Confidence of the fallback returned when every region is discarded
   */
  fallbackConfidence: number;

  /**
   * Bound on a single oracle call
   */
  oracleTimeoutMs: number;
}

export const DEFAULT_RELIABILITY_WEIGHTS: ReliabilityWeights = {
  verified_refresh: 1.0,
  aggregator: 0.9,
  pattern_learned: 0.6,
  stored_prior: 0.55,
  rule_based: 0.5,
};

/**
 * The usual pole in the survey area: a metal single-sign pole
 */
export const DEFAULT_FALLBACK: Classification = {
  material: 'kov',
  type: 'stĺp značky samostatný',
  confidence: 0.4,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  weights: DEFAULT_RELIABILITY_WEIGHTS,
  fallback: DEFAULT_FALLBACK,
  cacheWriteThreshold: 0.5,
  agreementStep: 0.05,
  agreementCap: 0.1,
  maxConfidence: 0.99,
};

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = {
  discardThreshold: 0.3,
  fallbackConfidence: 0.3,
  oracleTimeoutMs: 30000,
};

function parseNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Load engine configuration from environment variables
 */
export function loadEngineConfigFromEnvironment(): EngineConfig {
  const config: EngineConfig = {
    weights: {
      verified_refresh: parseNumber('WEIGHT_VERIFIED_REFRESH', DEFAULT_RELIABILITY_WEIGHTS.verified_refresh),
      aggregator: parseNumber('WEIGHT_AGGREGATOR', DEFAULT_RELIABILITY_WEIGHTS.aggregator),
      pattern_learned: parseNumber('WEIGHT_PATTERN_LEARNED', DEFAULT_RELIABILITY_WEIGHTS.pattern_learned),
      stored_prior: parseNumber('WEIGHT_STORED_PRIOR', DEFAULT_RELIABILITY_WEIGHTS.stored_prior),
      rule_based: parseNumber('WEIGHT_RULE_BASED', DEFAULT_RELIABILITY_WEIGHTS.rule_based),
    },
    fallback: {
      material: process.env.FALLBACK_MATERIAL || DEFAULT_FALLBACK.material,
      type: process.env.FALLBACK_TYPE || DEFAULT_FALLBACK.type,
      confidence: parseNumber('FALLBACK_CONFIDENCE', DEFAULT_FALLBACK.confidence),
    },
    cacheWriteThreshold: parseNumber('CACHE_WRITE_THRESHOLD', DEFAULT_ENGINE_CONFIG.cacheWriteThreshold),
    agreementStep: DEFAULT_ENGINE_CONFIG.agreementStep,
    agreementCap: DEFAULT_ENGINE_CONFIG.agreementCap,
    maxConfidence: DEFAULT_ENGINE_CONFIG.maxConfidence,
  };

  validateEngineConfig(config);
  return config;
}

/**
 * Load aggregator configuration from environment variables
 */
export function loadAggregatorConfigFromEnvironment(): AggregatorConfig {
  const config: AggregatorConfig = {
    discardThreshold: parseNumber('REGION_DISCARD_THRESHOLD', DEFAULT_AGGREGATOR_CONFIG.discardThreshold),
    fallbackConfidence: DEFAULT_AGGREGATOR_CONFIG.fallbackConfidence,
    oracleTimeoutMs: parseNumber('ORACLE_TIMEOUT_MS', DEFAULT_AGGREGATOR_CONFIG.oracleTimeoutMs),
  };

  if (config.discardThreshold < 0 || config.discardThreshold >= 1) {
    throw new ConfigError('REGION_DISCARD_THRESHOLD must be in [0, 1)');
  }
  if (config.oracleTimeoutMs < 1) {
    throw new ConfigError('ORACLE_TIMEOUT_MS must be positive');
  }
  return config;
}

/**
 * Verified-on-refresh > aggregator > learned pattern > rule-based fallback
 */
export function validateReliabilityWeights(weights: ReliabilityWeights): void {
  const ordered: ObservationKind[] = ['verified_refresh', 'aggregator', 'pattern_learned', 'rule_based'];

  for (const [kind, weight] of Object.entries(weights)) {
    if (!(weight > 0)) {
      throw new ConfigError(`Reliability weight for ${kind} must be positive`);
    }
  }

  for (let i = 1; i < ordered.length; i++) {
    const higher = ordered[i - 1];
    const lower = ordered[i];
    if (weights[higher] <= weights[lower]) {
      throw new ConfigError(
        `Reliability weight for ${higher} (${weights[higher]}) must exceed ${lower} (${weights[lower]})`
      );
    }
  }
}

export function validateEngineConfig(config: EngineConfig): void {
  validateReliabilityWeights(config.weights);

  if (config.fallback.confidence < 0.3 || config.fallback.confidence > 0.4) {
    throw new ConfigError('FALLBACK_CONFIDENCE must be between 0.3 and 0.4');
  }
  if (!config.fallback.material || !config.fallback.type) {
    throw new ConfigError('Fallback material and type must be non-empty');
  }
  if (config.cacheWriteThreshold < 0 || config.cacheWriteThreshold > 1) {
    throw new ConfigError('CACHE_WRITE_THRESHOLD must be in [0, 1]');
  }
}
