import { LLMClassification } from './ticket-model';

/**
 * Parse model output as a JSON object, repairing the usual formatting slips
 * (code fences, prose around the object, single quotes, trailing commas).
 * Returns null when nothing usable can be recovered.
 */
export function repairJson(text: string): LLMClassification | null {
  const direct = tryParse(text);
  if (direct) return direct;

  let cleaned = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  const extracted = tryParse(cleaned);
  if (extracted) return extracted;

  cleaned = cleaned
    .replace(/'/g, '"')
    .replace(/\r?\n/g, ' ')
    .replace(/,\s*}/g, '}')
    .replace(/,\s*]/g, ']');

  const repaired = tryParse(cleaned);
  if (!repaired) {
    console.error(`[triage] could not repair model JSON: ${text.slice(0, 200)}`);
  }
  return repaired;
}

function tryParse(text: string): LLMClassification | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(value) ? value : null;
}

function isRecord(value: unknown): value is LLMClassification {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collapse runs of whitespace in a model summary. Blank summaries become null.
 */
export function cleanSummary(summary: unknown): string | null {
  if (typeof summary !== 'string') return null;
  const cleaned = summary.split(/\s+/).filter(Boolean).join(' ');
  return cleaned || null;
}
