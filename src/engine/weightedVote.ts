import type { Classification, Material, PoleType } from '../types/classification.js';

/**
 * One vote: a classification and how much its source is trusted
 */
export interface Ballot extends Classification {
  weight: number;
}

export interface AxisTally {
  winner: string;
  /**
   * Winner's share of the total score on this axis
   */
  confidence: number;
  scores: Map<string, number>;
}

export interface VoteOutcome extends Classification {
  materialConfidence: number;
  typeConfidence: number;
  ballots: number;
}

export interface AgreementBonusOptions {
  step: number;
  cap: number;
  max: number;
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Score each candidate label by Σ weight × confidence.
 * Ties go to the candidate backed by the heaviest single ballot, then to the first seen.
 */
export function tallyAxis(ballots: readonly Ballot[], label: (ballot: Ballot) => string): AxisTally {
  const scores = new Map<string, number>();
  const heaviest = new Map<string, number>();

  for (const ballot of ballots) {
    const key = label(ballot);
    const weight = Math.max(0, ballot.weight);
    scores.set(key, (scores.get(key) ?? 0) + weight * clampConfidence(ballot.confidence));
    heaviest.set(key, Math.max(heaviest.get(key) ?? 0, weight));
  }

  let winner = '';
  let winnerScore = -1;
  let total = 0;
  for (const [key, score] of scores) {
    total += score;
    if (
      score > winnerScore ||
      (score === winnerScore && (heaviest.get(key) ?? 0) > (heaviest.get(winner) ?? 0))
    ) {
      winner = key;
      winnerScore = score;
    }
  }

  return { winner, confidence: total > 0 ? winnerScore / total : 0, scores };
}

/**
 * Weighted majority on both axes. A single ballot passes through unchanged;
 * otherwise confidence is the mean of the two axis shares. null when empty.
 */
export function weightedVote(ballots: readonly Ballot[]): VoteOutcome | null {
  if (ballots.length === 0) {
    return null;
  }

  if (ballots.length === 1) {
    const only = ballots[0];
    const confidence = clampConfidence(only.confidence);
    return {
      material: only.material,
      type: only.type,
      confidence,
      materialConfidence: confidence,
      typeConfidence: confidence,
      ballots: 1,
    };
  }

  const material = tallyAxis(ballots, b => b.material);
  const type = tallyAxis(ballots, b => b.type);
  const winningMaterial: Material = material.winner;
  const winningType: PoleType = type.winner;

  return {
    material: winningMaterial,
    type: winningType,
    confidence: clampConfidence((material.confidence + type.confidence) / 2),
    materialConfidence: material.confidence,
    typeConfidence: type.confidence,
    ballots: ballots.length,
  };
}

/**
 * Raise confidence for every additional agreeing source, up to the cap and ceiling
 */
export function applyAgreementBonus(confidence: number, ballots: number, options: AgreementBonusOptions): number {
  if (ballots < 2) {
    return clampConfidence(confidence);
  }
  const bonus = Math.min(options.cap, (ballots - 1) * options.step);
  return clampConfidence(Math.min(options.max, confidence + bonus));
}
