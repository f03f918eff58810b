import type { OracleReply } from './types.js';
import { isRecord } from '../utils/guards.js';

/**
 * Confidence as a number in [0, 1]; "85%" and a bare integer 85 read as 0.85
 */
export function parseConfidence(value: unknown): number | null {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string') {
    const match = value.trim().match(/^(-?\d+(?:[.,]\d+)?)\s*(%)?/);
    if (!match) return null;
    numeric = Number(match[1].replace(',', '.'));
    if (match[2]) numeric /= 100;
  } else {
    return null;
  }
  if (!Number.isFinite(numeric)) return null;
  if (numeric > 1 && numeric <= 100 && Number.isInteger(numeric)) numeric /= 100;
  if (numeric < 0 || numeric > 1) return null;
  return numeric;
}

function cleanLabel(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const label = value.trim().replace(/^["'`*[\s]+|["'`*\]\s.]+$/g, '');
  return label.length > 0 ? label : null;
}

function fromJson(text: string): OracleReply | null {
  const block = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  const candidate = (block ? block[1] : text).match(/\{[\s\S]*\}/);
  if (!candidate) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate[0]);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const material = cleanLabel(parsed.material);
  const type = cleanLabel(parsed.type);
  const confidence = parseConfidence(parsed.confidence);
  if (!material || !type || confidence === null) return null;

  const rationale = parsed.reasoning ?? parsed.rationale;
  return { material, type, confidence, rationale: typeof rationale === 'string' ? rationale.trim() : '' };
}

function fromLines(text: string): OracleReply | null {
  const fields = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim().replace(/^[-*\s]+/, '').replace(/\*\*/g, '');
    const match = line.match(/^(material|type|confidence|reasoning|rationale)\s*:\s*(.*)$/i);
    if (match && !fields.has(match[1].toLowerCase())) {
      fields.set(match[1].toLowerCase(), match[2]);
    }
  }

  const material = cleanLabel(fields.get('material'));
  const type = cleanLabel(fields.get('type'));
  const confidence = parseConfidence(fields.get('confidence'));
  if (!material || !type || confidence === null) return null;

  return {
    material,
    type,
    confidence,
    rationale: (fields.get('reasoning') ?? fields.get('rationale') ?? '').trim(),
  };
}

/**
 * Parse an oracle reply, either the "Material:/Type:/Confidence:/Reasoning:"
 * line format or a JSON object. null when a field is missing or malformed.
 */
export function parseOracleReply(text: string): OracleReply | null {
  if (!text || !text.trim()) return null;
  return fromLines(text) ?? fromJson(text);
}
