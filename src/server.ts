/**
 * @fileoverview Triage API server
 * @description Wires configuration, knowledge base, model provider and ticket stores into an Express app
 */

import express, { Express } from 'express';
import { OpenAICompatibleProvider } from '@triage/llm-router';
import {
  FirestoreTicketStore,
  KnowledgeBase,
  LocalFileTicketStore,
  TicketClassifier,
  TicketRepository,
  initFirestore,
  loadKnowledgeBase,
  resolveCredentialsPath,
  supportRoutes,
} from '@triage/support';
import { DependencyCheck, errorReportingMiddleware, healthRouter, requestLogger } from '@triage/observability';
import { AppConfig, loadConfig } from './config';

export interface ApiDeps {
  classifier: TicketClassifier;
  repository: TicketRepository;
  knowledgeBase: KnowledgeBase;
  checks?: DependencyCheck[];
}

export function createApiApp(deps: ApiDeps): Express {
  const app = express();

  app.use(requestLogger('api'));
  app.use(express.json({ limit: '100kb' }));

  app.use(healthRouter({ service: 'Ticket Triage Agent API', checks: deps.checks }));
  app.use(supportRoutes(deps));

  app.use(errorReportingMiddleware('api'));
  return app;
}

/**
 * Firestore probe for the deep health check. The service only counts as down
 * when tickets cannot be stored anywhere.
 */
export function firestoreCheck(
  firestore: Pick<FirestoreTicketStore, 'ping'> | null,
  fallbackEnabled: boolean
): DependencyCheck {
  return {
    name: 'firestore',
    check: async () => {
      if (!firestore) {
        if (fallbackEnabled) {
          return { status: 'degraded', detail: 'not configured, writing to local fallback' };
        }
        throw new Error('not configured and local fallback disabled');
      }
      try {
        await firestore.ping();
      } catch (error) {
        if (!fallbackEnabled) throw error;
        console.warn('[api] firestore ping failed:', error instanceof Error ? error.message : error);
        return { status: 'degraded', detail: 'unreachable, writing to local fallback' };
      }
      return {};
    },
  };
}

/**
 * Build every dependency from configuration. The knowledge base is read once here.
 */
export async function buildApiDeps(config: AppConfig): Promise<ApiDeps> {
  const knowledgeBase = await loadKnowledgeBase(config.kbPath);

  const provider = config.llm.apiKey
    ? new OpenAICompatibleProvider({
        provider: 'groq',
        apiKey: config.llm.apiKey,
        baseURL: config.llm.baseURL,
        defaultModel: config.llm.model,
        timeoutMs: config.llm.timeoutMs,
      })
    : null;
  if (!provider) {
    console.warn('[api] GROQ_API_KEY not set, classification will use heuristics only');
  }

  const db = initFirestore(
    resolveCredentialsPath(config.firebase.credentialsPath, config.firebase.defaultCredentialsPath)
  );
  const firestore = db ? new FirestoreTicketStore(db) : null;
  const repository = new TicketRepository({
    primary: firestore,
    fallback: new LocalFileTicketStore(config.storage.localFallbackPath),
    allowFallback: config.storage.allowLocalFallback,
  });

  const checks: DependencyCheck[] = [
    {
      name: 'llm',
      check: async () =>
        provider
          ? { detail: `${provider.provider}/${provider.defaultModel}` }
          : { status: 'degraded', detail: 'no API key, heuristics only' },
    },
    {
      name: 'knowledge_base',
      check: async () => ({ detail: `${knowledgeBase.size} entries` }),
    },
    firestoreCheck(firestore, repository.fallbackEnabled),
  ];

  return {
    knowledgeBase,
    classifier: new TicketClassifier({ knowledgeBase, provider, defaultSeverity: config.defaultSeverity }),
    repository,
    checks,
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const app = createApiApp(await buildApiDeps(config));
  app.listen(config.port, () => {
    console.log(`[api] listening on http://localhost:${config.port}`);
  });
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[api] failed to start:', error);
    process.exit(1);
  });
}
