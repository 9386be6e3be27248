import { Severity, isSeverity } from './ticket-model';

const SEVERITY_ALIASES = new Map<string, Severity>([
  ['critical', 'Critical'],
  ['blocker', 'Critical'],
  ['urgent', 'High'],
  ['high', 'High'],
  ['medium', 'Medium'],
  ['low', 'Low'],
]);

const HIGH_SIGNALS = ['crash', 'down', 'failed', 'cannot', 'error', 'not working', 'system is unavailable'];
const LOW_SIGNALS = ['slow', 'request', 'question'];

/**
 * Map a model-supplied severity onto the fixed scale. Unrecognised values
 * become Medium; blank values return null so the caller can fall back.
 */
export function normalizeSeverity(value: unknown): Severity | null {
  if (typeof value !== 'string') return null;
  const key = value.trim().toLowerCase();
  if (!key) return null;
  return SEVERITY_ALIASES.get(key) ?? 'Medium';
}

/**
 * Keyword heuristic used when the model gave no usable severity.
 */
export function inferSeverity(text: string, fallback: Severity = 'Medium'): Severity {
  const lower = text.toLowerCase();
  if (HIGH_SIGNALS.some((signal) => lower.includes(signal))) return 'High';
  if (LOW_SIGNALS.some((signal) => lower.includes(signal))) return 'Low';
  return fallback;
}

/**
 * Subcollection name for a stored ticket.
 */
export function severityBucket(value: string | null | undefined): Severity {
  if (!value) return 'Medium';
  const trimmed = value.trim();
  const capitalized = trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
  return isSeverity(capitalized) ? capitalized : 'Medium';
}
