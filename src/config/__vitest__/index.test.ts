import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import { ConfigError, loadClassifierConfig } from '../index.js';
import { DEFAULT_AGGREGATOR_CONFIG, DEFAULT_ENGINE_CONFIG } from '../EngineConfig.js';

vi.mock('dotenv', () => ({ config: vi.fn(), default: { config: vi.fn() } }));

const MANAGED = [
  'STORAGE_TYPE',
  'SQLITE_PATH',
  'PORT',
  'HOST',
  'API_KEYS',
  'REQUIRE_API_KEY',
  'NODE_ENV',
  'VISION_MODEL',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'OLLAMA_URL',
  'VISION_MODELS_CONFIG',
  'PHOTOS_DIR',
  'RULES_ENABLED',
  'RULES_PATH',
  'CONFIG_DIR',
  'DECIDE_CONCURRENCY',
  'FALLBACK_MATERIAL',
  'FALLBACK_TYPE',
  'FALLBACK_CONFIDENCE',
  'CACHE_WRITE_THRESHOLD',
  'REGION_DISCARD_THRESHOLD',
  'ORACLE_TIMEOUT_MS',
  'WEIGHT_VERIFIED_REFRESH',
  'WEIGHT_AGGREGATOR',
  'WEIGHT_PATTERN_LEARNED',
  'WEIGHT_STORED_PRIOR',
  'WEIGHT_RULE_BASED',
];

describe('loadClassifierConfig', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    for (const key of MANAGED) {
      delete process.env[key];
    }
    process.env.SQLITE_PATH = ':memory:';
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('applies defaults', () => {
    const config = loadClassifierConfig();

    expect(config.storage.type).toBe('sqlite');
    expect(config.engine).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(config.aggregator).toEqual(DEFAULT_AGGREGATOR_CONFIG);
    expect(config.server).toEqual({
      port: 3000,
      host: '0.0.0.0',
      apiKeys: [],
      requireApiKey: false,
      nodeEnv: 'development',
    });
    expect(config.vision.enabled).toBe(false);
    expect(config.photosDir).toBeUndefined();
    expect(config.rules.enabled).toBe(true);
    expect(config.rules.path.endsWith(path.join('config', 'rules.json'))).toBe(true);
    expect(config.concurrency).toBe(4);
  });

  it('reads server, vision and rule settings', () => {
    process.env.PORT = '8080';
    process.env.API_KEYS = 'first-key, second-key,,';
    process.env.REQUIRE_API_KEY = 'true';
    process.env.VISION_MODEL = 'llava-ollama';
    process.env.OLLAMA_URL = 'http://ollama.test:11434';
    process.env.PHOTOS_DIR = '/srv/photos';
    process.env.RULES_ENABLED = 'false';
    process.env.DECIDE_CONCURRENCY = '8';

    const config = loadClassifierConfig();

    expect(config.server.port).toBe(8080);
    expect(config.server.apiKeys).toEqual(['first-key', 'second-key']);
    expect(config.server.requireApiKey).toBe(true);
    expect(config.vision).toMatchObject({ enabled: true, model: 'llava-ollama', ollamaUrl: 'http://ollama.test:11434' });
    expect(config.photosDir).toBe('/srv/photos');
    expect(config.rules.enabled).toBe(false);
    expect(config.concurrency).toBe(8);
  });

  it('enables vision when only an API key is present', () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    expect(loadClassifierConfig().vision.enabled).toBe(true);
  });

  it('reads engine tuning', () => {
    process.env.FALLBACK_MATERIAL = 'betón';
    process.env.FALLBACK_CONFIDENCE = '0.35';
    process.env.CACHE_WRITE_THRESHOLD = '0.6';
    process.env.ORACLE_TIMEOUT_MS = '5000';

    const config = loadClassifierConfig();

    expect(config.engine.fallback).toEqual({ material: 'betón', type: 'stĺp značky samostatný', confidence: 0.35 });
    expect(config.engine.cacheWriteThreshold).toBe(0.6);
    expect(config.aggregator.oracleTimeoutMs).toBe(5000);
  });

  it.each([
    ['PORT', 'abc', 'PORT must be an integer, got "abc"'],
    ['PORT', '70000', 'Server port must be between 1 and 65535'],
    ['DECIDE_CONCURRENCY', '0', 'DECIDE_CONCURRENCY must be at least 1'],
    ['FALLBACK_CONFIDENCE', '0.9', 'FALLBACK_CONFIDENCE must be between 0.3 and 0.4'],
    ['WEIGHT_RULE_BASED', '0.95', 'Reliability weight for pattern_learned (0.6) must exceed rule_based (0.95)'],
    ['REGION_DISCARD_THRESHOLD', '1', 'REGION_DISCARD_THRESHOLD must be in [0, 1)'],
  ])('rejects %s=%s', (name, value, message) => {
    process.env[name] = value;

    expect(() => loadClassifierConfig()).toThrow(message);
  });

  it('rejects a required API key without keys', () => {
    process.env.REQUIRE_API_KEY = 'true';

    expect(() => loadClassifierConfig()).toThrow(ConfigError);
  });
});
