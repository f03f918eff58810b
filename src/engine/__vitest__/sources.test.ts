import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RuleBasedSource, applyRules, loadRuleSet, parseRuleSet, type RuleSet } from '../sources/RuleBasedSource.js';
import { LearnedPatternSource } from '../sources/LearnedPatternSource.js';
import { PriorRecordSource } from '../sources/PriorRecordSource.js';
import { SqliteAnalysisStore } from '../../storage/sqlite/SqliteAnalysisStore.js';
import { resolveConfigFile } from '../../config/paths.js';
import { ConfigError } from '../../config/EngineConfig.js';
import type { SubjectRecord } from '../../types/classification.js';

const SIGN = 'stĺp značky samostatný';

describe('rule-based source', () => {
  let rules: RuleSet;

  beforeEach(() => {
    rules = loadRuleSet(resolveConfigFile('rules.json'));
  });

  it.each([
    ['100', 'signal-pole', 'kov', 'stĺp svetelného signalizačného zariadenia', 0.65],
    ['2000', 'signal-pole', 'kov', 'stĺp svetelného signalizačného zariadenia', 0.65],
    ['40', 'double-sign', 'kov', 'stĺp značky dvojitý', 0.6],
    ['30', 'street-light', 'kov', 'stĺp verejného osvetlenia', 0.55],
    ['1001', 'high-range', 'betón', SIGN, 0.5],
    ['7', 'default', 'kov', SIGN, 0.7],
    ['A-12', 'non-numeric', 'kov', SIGN, 0.5],
  ])('classifies %s by rule %s', (subjectId, rule, material, type, confidence) => {
    expect(applyRules(rules, subjectId)).toEqual({ material, type, confidence, rule });
  });

  it('observes as rule_based', async () => {
    const source = new RuleBasedSource(rules);
    const observation = await source.observe({ subjectId: '7', forceRefresh: false, prior: null });
    expect(observation).toEqual({ material: 'kov', type: SIGN, confidence: 0.7, sourceKind: 'rule_based' });
  });

  it('rejects malformed rule files', () => {
    const classification = { material: 'kov', type: SIGN, confidence: 0.5 };
    expect(() => parseRuleSet({})).toThrow(ConfigError);
    expect(() =>
      parseRuleSet({ numeric: [{ name: 'bare', ...classification }], numericDefault: classification, nonNumeric: classification })
    ).toThrow('numeric[0] needs "modulo" or "greaterThan"');
    expect(() =>
      parseRuleSet({ numeric: [], numericDefault: { ...classification, confidence: 1.5 }, nonNumeric: classification })
    ).toThrow(ConfigError);
    expect(() =>
      parseRuleSet({
        numeric: [{ name: 'zero', modulo: 0, ...classification }],
        numericDefault: classification,
        nonNumeric: classification,
      })
    ).toThrow('numeric[0].modulo must be positive');
  });

  it('requires both conditions when a rule names both', () => {
    const classification = { material: 'betón', type: SIGN, confidence: 0.6 };
    const combined = parseRuleSet({
      numeric: [{ name: 'big-even', modulo: 2, remainder: 0, greaterThan: 500, ...classification }],
      numericDefault: { material: 'kov', type: SIGN, confidence: 0.7 },
      nonNumeric: { material: 'kov', type: SIGN, confidence: 0.5 },
    });

    expect(applyRules(combined, '600').rule).toBe('big-even');
    expect(applyRules(combined, '400').rule).toBe('default');
    expect(applyRules(combined, '601').rule).toBe('default');
  });
});

describe('learned pattern source', () => {
  let store: SqliteAnalysisStore;

  beforeEach(async () => {
    store = new SqliteAnalysisStore({ filename: ':memory:' });
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it('has nothing to say before any correction', async () => {
    const source = new LearnedPatternSource(store);
    expect(await source.observe({ subjectId: '25', forceRefresh: false, prior: null })).toBeNull();
  });

  it('proposes the best hypothesis of the id buckets', async () => {
    await store.applyCorrection('15', 'betón', SIGN);
    const source = new LearnedPatternSource(store);

    const observation = await source.observe({ subjectId: '25', forceRefresh: false, prior: null });

    // mod10 bucket 5 holds one sample: 1.0 × 1/10
    expect(observation).toMatchObject({ material: 'betón', type: SIGN, sourceKind: 'pattern_learned' });
    expect(observation?.confidence).toBeCloseTo(0.1);
  });
});

describe('prior record source', () => {
  const prior: SubjectRecord = {
    subjectId: '9',
    material: 'drevo',
    type: SIGN,
    confidence: 0.7,
    sourceKind: 'ensemble',
    timestamp: 1,
    verified: false,
    correctionCount: 0,
  };
  const source = new PriorRecordSource();

  it('offers an unverified record as stored_prior', async () => {
    expect(await source.observe({ subjectId: '9', forceRefresh: false, prior })).toEqual({
      material: 'drevo',
      type: SIGN,
      confidence: 0.7,
      sourceKind: 'stored_prior',
    });
  });

  it('offers a verified record only under a forced refresh', async () => {
    const verified = { ...prior, verified: true, confidence: 1 };
    expect(await source.observe({ subjectId: '9', forceRefresh: false, prior: verified })).toBeNull();
    expect(await source.observe({ subjectId: '9', forceRefresh: true, prior: verified })).toMatchObject({
      sourceKind: 'verified_refresh',
      confidence: 1,
    });
  });

  it('has nothing without a record', async () => {
    expect(await source.observe({ subjectId: '9', forceRefresh: false, prior: null })).toBeNull();
  });
});
