/**
 * Central configuration loader for the pole classifier
 */

import * as dotenv from 'dotenv';
import { logger } from '../utils/logger.js';
import { type StorageConfig, createStorageConfig } from './storage.js';
import {
  type AggregatorConfig,
  type EngineConfig,
  ConfigError,
  loadAggregatorConfigFromEnvironment,
  loadEngineConfigFromEnvironment,
} from './EngineConfig.js';
import { resolveConfigFile } from './paths.js';
import type { VisionSettings } from '../vision/VisionModelFactory.js';

/**
 * Complete classifier configuration
 */
export interface ClassifierConfig {
  storage: StorageConfig;
  engine: EngineConfig;
  aggregator: AggregatorConfig;

  server: {
    port: number;
    host: string;
    apiKeys: string[];
    requireApiKey: boolean;
    nodeEnv: string;
  };

  /**
   * Vision oracle selection and credentials; `enabled` is false without VISION_MODEL or a key
   */
  vision: VisionSettings & { enabled: boolean };

  /**
   * Directory of `<subjectId>.{png,jpg,jpeg}` photographs; the aggregator is off without it
   */
  photosDir?: string;

  rules: {
    enabled: boolean;
    path: string;
  };

  /**
   * Subjects decided at once by batch requests
   */
  concurrency: number;
}

function parseInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Load the complete configuration from environment variables (and .env)
 */
export function loadClassifierConfig(): ClassifierConfig {
  dotenv.config();
  logger.debug('Loading classifier configuration from environment variables');

  const vision: VisionSettings = {
    model: process.env.VISION_MODEL || undefined,
    openaiApiKey: process.env.OPENAI_API_KEY || undefined,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
    ollamaUrl: process.env.OLLAMA_URL || undefined,
    configPath: process.env.VISION_MODELS_CONFIG || undefined,
  };

  const config: ClassifierConfig = {
    storage: createStorageConfig(process.env.STORAGE_TYPE),
    engine: loadEngineConfigFromEnvironment(),
    aggregator: loadAggregatorConfigFromEnvironment(),
    server: {
      port: parseInteger('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',
      apiKeys: parseList(process.env.API_KEYS),
      requireApiKey: process.env.REQUIRE_API_KEY === 'true',
      nodeEnv: process.env.NODE_ENV || 'development',
    },
    vision: {
      ...vision,
      enabled: Boolean(vision.model || vision.openaiApiKey || vision.anthropicApiKey || vision.ollamaUrl),
    },
    photosDir: process.env.PHOTOS_DIR || undefined,
    rules: {
      enabled: process.env.RULES_ENABLED !== 'false',
      path: process.env.RULES_PATH || resolveConfigFile('rules.json'),
    },
    concurrency: parseInteger('DECIDE_CONCURRENCY', 4),
  };

  validateClassifierConfig(config);

  logger.debug('Configuration loaded successfully', {
    storageType: config.storage.type,
    serverPort: config.server.port,
    visionEnabled: config.vision.enabled,
    photosDir: config.photosDir,
    rulesEnabled: config.rules.enabled,
  });

  return config;
}

/**
 * Engine and aggregator settings are validated as they load
 */
export function validateClassifierConfig(config: ClassifierConfig): void {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Server port must be between 1 and 65535');
  }
  if (config.server.requireApiKey && config.server.apiKeys.length === 0) {
    errors.push('REQUIRE_API_KEY is set but API_KEYS is empty');
  }
  if (config.concurrency < 1) {
    errors.push('DECIDE_CONCURRENCY must be at least 1');
  }

  if (errors.length > 0) {
    throw new ConfigError(`Configuration validation failed: ${errors.join(', ')}`);
  }
}

export { type StorageConfig, createStorageConfig } from './storage.js';
export { ConfigError } from './EngineConfig.js';
