/**
 * Vision Model Factory - Creates the vision oracle named by configuration
 */

import * as fs from 'fs';
import type { VisionModelConfig, VisionModelsConfigFile, VisionOracle, VisionProviderType } from './types.js';
import { OllamaVisionProvider } from './providers/OllamaVisionProvider.js';
import { OpenAIVisionProvider } from './providers/OpenAIVisionProvider.js';
import { AnthropicVisionProvider } from './providers/AnthropicVisionProvider.js';
import { isRecord } from '../utils/guards.js';
import { resolveConfigFile } from '../config/paths.js';
import { ConfigError } from '../config/EngineConfig.js';
import { logger } from '../utils/logger.js';

/**
 * Credentials and model selection, passed in explicitly
 */
export interface VisionSettings {
  /**
   * Key into vision-models.json; the file's default when absent
   */
  model?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  ollamaUrl?: string;
  configPath?: string;
}

const PROVIDERS: readonly VisionProviderType[] = ['openai', 'anthropic', 'ollama'];

function toProvider(value: unknown): VisionProviderType | null {
  return PROVIDERS.find(p => p === value) ?? null;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseModelConfig(key: string, raw: unknown): VisionModelConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Vision model "${key}" must be an object`);
  }
  const provider = toProvider(raw.provider);
  if (!provider) {
    throw new ConfigError(`Vision model "${key}" has unknown provider: ${String(raw.provider)}`);
  }
  if (typeof raw.model !== 'string' || !raw.model) {
    throw new ConfigError(`Vision model "${key}" needs a model name`);
  }

  const config: VisionModelConfig = { provider, model: raw.model };
  if (typeof raw.baseUrl === 'string') config.baseUrl = raw.baseUrl;
  if (typeof raw.description === 'string') config.description = raw.description;
  if (isRecord(raw.options)) {
    config.options = {
      timeout: optionalNumber(raw.options.timeout),
      maxRetries: optionalNumber(raw.options.maxRetries),
      maxTokens: optionalNumber(raw.options.maxTokens),
      temperature: optionalNumber(raw.options.temperature),
      requestsPerMinute: optionalNumber(raw.options.requestsPerMinute),
    };
  }
  return config;
}

/**
 * Validate the parsed contents of vision-models.json
 */
export function parseVisionModelsConfig(raw: unknown): VisionModelsConfigFile {
  if (!isRecord(raw) || !isRecord(raw.models)) {
    throw new ConfigError('Vision models config must have a "models" object');
  }
  const models: Record<string, VisionModelConfig> = {};
  for (const [key, value] of Object.entries(raw.models)) {
    models[key] = parseModelConfig(key, value);
  }
  if (typeof raw.default !== 'string' || !(raw.default in models)) {
    throw new ConfigError('Vision models config "default" must name one of its models');
  }
  return { default: raw.default, models };
}

export class VisionModelFactory {
  private static configCache = new Map<string, VisionModelsConfigFile>();

  /**
   * Create a vision oracle; credentials from settings override the file
   */
  static create(config: VisionModelConfig, settings: VisionSettings = {}): VisionOracle {
    const effectiveConfig: VisionModelConfig = { ...config };

    switch (effectiveConfig.provider) {
      case 'ollama':
        effectiveConfig.baseUrl = settings.ollamaUrl || config.baseUrl;
        return new OllamaVisionProvider(effectiveConfig);
      case 'openai':
        effectiveConfig.apiKey = settings.openaiApiKey || config.apiKey;
        return new OpenAIVisionProvider(effectiveConfig);
      case 'anthropic':
        effectiveConfig.apiKey = settings.anthropicApiKey || config.apiKey;
        return new AnthropicVisionProvider(effectiveConfig);
    }
  }

  /**
   * Load the vision models configuration file
   */
  static loadConfig(configPath: string = resolveConfigFile('vision-models.json')): VisionModelsConfigFile {
    const cached = this.configCache.get(configPath);
    if (cached) {
      return cached;
    }

    const config = parseVisionModelsConfig(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    this.configCache.set(configPath, config);
    logger.debug(`Loaded ${Object.keys(config.models).length} vision models from ${configPath}`);
    return config;
  }

  /**
   * Create the oracle selected by settings.model, or the file's default
   */
  static createFromSettings(settings: VisionSettings = {}): VisionOracle {
    const config = this.loadConfig(settings.configPath);
    const modelKey = settings.model || config.default;
    const modelConfig = config.models[modelKey];

    if (!modelConfig) {
      throw new ConfigError(
        `Vision model not found: ${modelKey}. Available models: ${Object.keys(config.models).join(', ')}`
      );
    }

    return this.create(modelConfig, settings);
  }

  static listAvailableModels(configPath?: string): string[] {
    return Object.keys(this.loadConfig(configPath).models);
  }

  /**
   * Clear the config cache (useful for testing or config updates)
   */
  static clearCache(): void {
    this.configCache.clear();
  }
}
