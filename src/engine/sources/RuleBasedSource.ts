import * as fs from 'fs';
import type { Classification } from '../../types/classification.js';
import type { ObservationContext, ObservationSource, SourceObservation } from '../types.js';
import { floorMod, parseNumericId } from '../../storage/buckets.js';
import { ConfigError } from '../../config/EngineConfig.js';
import { isRecord } from '../../utils/guards.js';

/**
 * A rule matches when `id mod modulo = remainder`, or when `id > greaterThan`;
 * a rule naming both needs both
 */
export interface NumericRule extends Classification {
  name: string;
  modulo?: number;
  remainder?: number;
  greaterThan?: number;
}

export interface RuleSet {
  /**
   * First match wins
   */
  numeric: NumericRule[];
  numericDefault: Classification;
  nonNumeric: Classification;
}

function parseClassification(raw: unknown, where: string): Classification {
  if (
    !isRecord(raw) ||
    typeof raw.material !== 'string' ||
    typeof raw.type !== 'string' ||
    typeof raw.confidence !== 'number' ||
    raw.confidence < 0 ||
    raw.confidence > 1
  ) {
    throw new ConfigError(`${where} needs material, type and a confidence in [0, 1]`);
  }
  return { material: raw.material, type: raw.type, confidence: raw.confidence };
}

function optionalInteger(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`${where}.${key} must be an integer`);
  }
  return value;
}

export function parseRuleSet(raw: unknown): RuleSet {
  if (!isRecord(raw) || !Array.isArray(raw.numeric)) {
    throw new ConfigError('Rule set needs a "numeric" array');
  }

  const numeric = raw.numeric.map((entry: unknown, index): NumericRule => {
    const where = `numeric[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${where} must be an object`);
    }
    const rule: NumericRule = {
      name: typeof entry.name === 'string' ? entry.name : where,
      ...parseClassification(entry, where),
      modulo: optionalInteger(entry, 'modulo', where),
      remainder: optionalInteger(entry, 'remainder', where),
      greaterThan: optionalInteger(entry, 'greaterThan', where),
    };
    if (rule.modulo === undefined && rule.greaterThan === undefined) {
      throw new ConfigError(`${where} needs "modulo" or "greaterThan"`);
    }
    if (rule.modulo !== undefined && rule.modulo <= 0) {
      throw new ConfigError(`${where}.modulo must be positive`);
    }
    return rule;
  });

  return {
    numeric,
    numericDefault: parseClassification(raw.numericDefault, 'numericDefault'),
    nonNumeric: parseClassification(raw.nonNumeric, 'nonNumeric'),
  };
}

export function loadRuleSet(filePath: string): RuleSet {
  return parseRuleSet(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

function matches(rule: NumericRule, id: number): boolean {
  if (rule.modulo !== undefined && floorMod(id, rule.modulo) !== (rule.remainder ?? 0)) {
    return false;
  }
  if (rule.greaterThan !== undefined && !(id > rule.greaterThan)) {
    return false;
  }
  return true;
}

/**
 * Classify from the subject id alone. Always has an answer.
 */
export function applyRules(rules: RuleSet, subjectId: string): Classification & { rule: string } {
  const id = parseNumericId(subjectId);
  if (id === null) {
    return { ...rules.nonNumeric, rule: 'non-numeric' };
  }
  const rule = rules.numeric.find(r => matches(r, id));
  if (rule) {
    return { material: rule.material, type: rule.type, confidence: rule.confidence, rule: rule.name };
  }
  return { ...rules.numericDefault, rule: 'default' };
}

export class RuleBasedSource implements ObservationSource {
  readonly name = 'rule-based';

  constructor(private readonly rules: RuleSet) {}

  async observe(context: ObservationContext): Promise<SourceObservation | null> {
    const { material, type, confidence } = applyRules(this.rules, context.subjectId);
    return { material, type, confidence, sourceKind: 'rule_based' };
  }
}
