import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { TicketClassifier } from './ai-triage';
import { PersistenceError } from './errors';
import { KnowledgeBase } from './knowledge-base';
import { TicketRepository, buildRecord } from './ticket-store';

export const MAX_TICKET_LENGTH = 20_000;

export const triageRequestSchema = z.object({
  client_id: z.string().max(200).nullish(),
  ticket: z
    .string()
    .max(MAX_TICKET_LENGTH)
    .refine((value) => value.trim().length > 0, 'ticket must not be empty'),
});

export interface SupportRouteDeps {
  classifier: TicketClassifier;
  repository: TicketRepository;
  knowledgeBase: KnowledgeBase;
}

/**
 * POST /triage: classify a ticket, store it and return the classification.
 */
export function triageHandler(deps: SupportRouteDeps) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = triageRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'invalid_request',
        message: 'Body must be {"client_id": string, "ticket": non-empty string}',
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    try {
      const result = await deps.classifier.classify(parsed.data.ticket, parsed.data.client_id);
      const saved = await deps.repository.save(buildRecord(result));
      console.log(
        `[triage] ${result.client_id} -> ${saved.issueId}/${saved.severity} via ${result.analysis_source}, stored in ${saved.store}`
      );
      res.json(result);
    } catch (error) {
      if (error instanceof PersistenceError) {
        console.error('[triage] persistence failed:', error.message);
        res.status(500).json({ error: 'persistence_failed', message: error.message });
        return;
      }
      next(error);
    }
  };
}

export function listArticlesHandler(deps: Pick<SupportRouteDeps, 'knowledgeBase'>) {
  return (_req: Request, res: Response): void => {
    res.json({ entries: deps.knowledgeBase.list(), total: deps.knowledgeBase.size });
  };
}

export function getArticleHandler(deps: Pick<SupportRouteDeps, 'knowledgeBase'>) {
  return (req: Request, res: Response): void => {
    const entry = deps.knowledgeBase.get(req.params.id);
    if (!entry) {
      res.status(404).json({ error: 'not_found', message: `No knowledge base entry ${req.params.id}` });
      return;
    }
    res.json(entry);
  };
}

export default function supportRoutes(deps: SupportRouteDeps): Router {
  const router = Router();

  router.post('/triage', triageHandler(deps));

  // --- Knowledge Base ---
  router.get('/kb', listArticlesHandler(deps));
  router.get('/kb/:id', getArticleHandler(deps));

  return router;
}
