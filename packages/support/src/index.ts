export { TicketClassifier, TicketClassifierOptions, buildTriageMessages, DEFAULT_CATEGORY, DEFAULT_NEXT_STEP } from './ai-triage';
export {
  Severity,
  SEVERITIES,
  NEW_ISSUES,
  UNKNOWN_CLIENT,
  AnalysisSource,
  KBSource,
  Ticket,
  TriageRequest,
  LLMClassification,
  ClassificationResult,
  PersistedTicketRecord,
  isSeverity,
} from './ticket-model';
export { default as supportRoutes, SupportRouteDeps, triageRequestSchema, MAX_TICKET_LENGTH } from './routes';

// Knowledge Base
export { KnowledgeBase, KBEntry, KBMatch, loadKnowledgeBase, parseKnowledgeBase } from './knowledge-base';

// Severity + model output helpers
export { normalizeSeverity, inferSeverity, severityBucket } from './severity';
export { repairJson, cleanSummary } from './json-repair';

// Persistence
export {
  TicketStore,
  SaveOutcome,
  FirestoreTicketStore,
  LocalFileTicketStore,
  TicketRepository,
  TicketRepositoryOptions,
  TICKETS_COLLECTION,
  buildRecord,
  initFirestore,
  resolveCredentialsPath,
} from './ticket-store';

export { KnowledgeBaseError, PersistenceError } from './errors';
