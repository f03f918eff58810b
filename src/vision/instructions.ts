import type { RegionSpec } from './types.js';

/**
 * Labels the survey uses most often. The vocabulary is open: the oracle may
 * answer with anything, these only anchor its wording.
 */
export const COMMON_MATERIALS = ['kov', 'betón', 'drevo', 'plast'] as const;

export const COMMON_POLE_TYPES = [
  'stĺp značky samostatný',
  'stĺp značky dvojitý',
  'stĺp verejného osvetlenia',
  'stĺp svetelného signalizačného zariadenia',
  'stĺp informatívny',
] as const;

const BASE_INSTRUCTION = `You are looking at a photograph of a roadside pole that carries traffic signs.
Classify the pole itself, not the pavement, walls or signs around it.

Material: what the vertical pole is made of. Usual answers: ${COMMON_MATERIALS.join(', ')}.
Metal poles are thin, round and smooth, often galvanized. Concrete poles are thick and rough.

Type: what kind of pole it is. Usual answers: ${COMMON_POLE_TYPES.join(', ')}.`;

const RESPONSE_FORMAT = `Answer in exactly this format:
Material: <material>
Type: <type>
Confidence: <number between 0.0 and 1.0>
Reasoning: <one sentence about the visual evidence>`;

/**
 * Instruction for one region, optionally extended with learned hints
 */
export function buildInstruction(region: RegionSpec, hints: readonly string[] = []): string {
  const parts = [BASE_INSTRUCTION, region.focus];
  if (hints.length > 0) {
    parts.push(`Lessons from earlier corrections:\n${hints.map(h => `- ${h}`).join('\n')}`);
  }
  parts.push(RESPONSE_FORMAT);
  return parts.join('\n\n');
}
