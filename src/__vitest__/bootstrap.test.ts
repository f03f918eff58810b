import { describe, it, expect } from 'vitest';
import { createClassifier } from '../bootstrap.js';
import type { ClassifierConfig } from '../config/index.js';
import { DEFAULT_AGGREGATOR_CONFIG, DEFAULT_ENGINE_CONFIG } from '../config/EngineConfig.js';
import { DEFAULT_POSTGRES_CONFIG } from '../storage/postgres/PostgresConfig.js';
import { resolveConfigFile } from '../config/paths.js';

function testConfig(overrides: Partial<ClassifierConfig> = {}): ClassifierConfig {
  return {
    storage: { type: 'sqlite', sqlitePath: ':memory:', postgres: DEFAULT_POSTGRES_CONFIG },
    engine: DEFAULT_ENGINE_CONFIG,
    aggregator: DEFAULT_AGGREGATOR_CONFIG,
    server: { port: 3000, host: '127.0.0.1', apiKeys: [], requireApiKey: false, nodeEnv: 'test' },
    vision: { enabled: false },
    rules: { enabled: true, path: resolveConfigFile('rules.json') },
    concurrency: 2,
    ...overrides,
  };
}

describe('createClassifier', () => {
  it('wires a working service on an in-memory store', async () => {
    const classifier = await createClassifier(testConfig());

    try {
      const corrected = await classifier.service.correct('100', 'betón', 'stĺp verejného osvetlenia');
      const decision = await classifier.service.decide('100');

      expect(corrected.record.verified).toBe(true);
      expect(decision).toMatchObject({ subjectId: '100', material: 'betón', verified: true });
    } finally {
      await classifier.close();
    }
  });

  it('skips photo analysis when the photo directory is missing', async () => {
    const classifier = await createClassifier(
      testConfig({
        vision: { enabled: true, model: 'llava-ollama' },
        photosDir: '/nonexistent/pole-photos',
        rules: { enabled: false, path: '' },
      })
    );

    try {
      const decision = await classifier.service.decide('5');
      expect(decision.fallback).toBe(true);
    } finally {
      await classifier.close();
    }
  });

  it('rejects when the rule file cannot be read', async () => {
    await expect(
      createClassifier(testConfig({ rules: { enabled: true, path: '/nonexistent/rules.json' } }))
    ).rejects.toThrow('ENOENT');
  });
});
