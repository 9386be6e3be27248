export const SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Bucket for tickets that match no knowledge-base entry */
export const NEW_ISSUES = 'NEW_ISSUES';
export const UNKNOWN_CLIENT = 'unknown-client';

export type AnalysisSource = 'llm+kb' | 'llm' | 'heuristics';
export type KBSource = 'knowledge_base' | 'auto_generated';

export interface Ticket {
  client_id: string;
  ticket: string;
  created_at: string;
}

export interface TriageRequest {
  client_id?: string | null;
  ticket: string;
}

/**
 * Parsed model answer. The model is asked for summary, category, severity,
 * kb_issue_id, kb_issue_title and next_step, but may omit or mistype any of
 * them, so every value stays unknown until read.
 */
export type LLMClassification = Record<string, unknown>;

export interface ClassificationResult {
  client_id: string;
  summary: string;
  full_summary: string | null;
  full_text: string;
  category: string;
  severity: Severity;
  kb_match: string;
  next_step: string;
  analysis_source: AnalysisSource;
  llm_raw: LLMClassification | null;
}

export interface PersistedTicketRecord extends ClassificationResult, Ticket {
  kb_source: KBSource;
}

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}
