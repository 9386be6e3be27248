import { ChatMessage, CompletionProvider, LLMError } from '@triage/llm-router';
import { KBEntry, KnowledgeBase } from './knowledge-base';
import { cleanSummary, repairJson } from './json-repair';
import { inferSeverity, normalizeSeverity } from './severity';
import {
  AnalysisSource,
  ClassificationResult,
  LLMClassification,
  NEW_ISSUES,
  Severity,
  UNKNOWN_CLIENT,
} from './ticket-model';

export const DEFAULT_NEXT_STEP = 'Investigate and escalate to support.';
export const DEFAULT_CATEGORY = 'General';
const SUMMARY_FALLBACK_LENGTH = 80;

const SYSTEM_PROMPT =
  'You are an expert IT ticket classifier. ' +
  'Use the knowledge base entries to pick the closest issue ID. ' +
  'Always respond with strict JSON containing these keys: ' +
  'summary (string), category (string), severity (Critical|High|Medium|Low), ' +
  "kb_issue_id (string, one of the provided KB IDs or 'NEW_ISSUE'), " +
  'kb_issue_title (string), next_step (string with the best recommended action).';

export interface TicketClassifierOptions {
  knowledgeBase: KnowledgeBase;
  /** Model used for classification; null runs on heuristics only */
  provider?: CompletionProvider | null;
  /** Severity used when neither the model, the KB nor the keywords decide */
  defaultSeverity?: Severity;
}

/**
 * Build the chat messages for a classification request.
 */
export function buildTriageMessages(ticket: string, knowledgeBase: KnowledgeBase): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content:
        'Knowledge Base Entries:\n' +
        `${knowledgeBase.promptContext()}\n\n` +
        'Ticket to Analyze:\n' +
        `${ticket}\n\n` +
        'Return ONLY JSON. Choose kb_issue_id from the KB list when possible; ' +
        "otherwise respond with 'NEW_ISSUE'.",
    },
  ];
}

/**
 * Classifies tickets with the model first and the knowledge base and keyword
 * heuristics filling whatever the model leaves out. Never throws on model
 * failure.
 */
export class TicketClassifier {
  private readonly knowledgeBase: KnowledgeBase;
  private readonly provider: CompletionProvider | null;
  private readonly defaultSeverity: Severity;

  constructor(options: TicketClassifierOptions) {
    this.knowledgeBase = options.knowledgeBase;
    this.provider = options.provider ?? null;
    this.defaultSeverity = options.defaultSeverity ?? 'Medium';
  }

  async classify(ticket: string, clientId?: string | null): Promise<ClassificationResult> {
    const llm = await this.askModel(ticket);

    // The model's KB pick wins only when it names a real entry
    const kb: KBEntry | null =
      this.knowledgeBase.get(stringField(llm?.kb_issue_id)) ?? this.knowledgeBase.match(ticket)?.entry ?? null;

    const fullSummary = cleanSummary(llm?.summary);
    const severity =
      normalizeSeverity(llm?.severity) ?? kb?.severity ?? inferSeverity(ticket, this.defaultSeverity);

    return {
      client_id: clientId?.trim() || UNKNOWN_CLIENT,
      summary: fullSummary ?? kb?.title ?? ticket.slice(0, SUMMARY_FALLBACK_LENGTH),
      full_summary: fullSummary,
      full_text: ticket,
      category: stringField(llm?.category) ?? kb?.category ?? DEFAULT_CATEGORY,
      severity,
      kb_match: kb?.id ?? NEW_ISSUES,
      next_step: stringField(llm?.next_step) ?? kb?.recommended_action ?? DEFAULT_NEXT_STEP,
      analysis_source: analysisSource(llm !== null, kb !== null),
      llm_raw: llm,
    };
  }

  /**
   * Ask the model for a classification. Any failure yields null.
   */
  private async askModel(ticket: string): Promise<LLMClassification | null> {
    if (!this.provider) {
      console.warn('[triage] no model configured, using heuristics');
      return null;
    }

    try {
      const response = await this.provider.complete(buildTriageMessages(ticket, this.knowledgeBase));
      console.log(`[triage] ${response.provider}/${response.model} answered in ${response.latencyMs}ms`);
      const parsed = repairJson(response.content);
      return parsed && Object.keys(parsed).length > 0 ? parsed : null;
    } catch (error) {
      if (error instanceof LLMError) {
        console.error(`[triage] model call failed (${error.errorType}): ${error.message}`);
      } else {
        console.error('[triage] unexpected model failure:', error);
      }
      return null;
    }
  }
}

function stringField(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed || null;
}

function analysisSource(fromModel: boolean, fromKb: boolean): AnalysisSource {
  if (fromModel && fromKb) return 'llm+kb';
  if (fromModel) return 'llm';
  return 'heuristics';
}
