import express, { Express, NextFunction, Request, Response } from 'express';
import { errorReportingMiddleware, requestLogger } from '@triage/observability';
import { TriageApiClient, TriageApiError } from './api-client';
import { renderIntakePage } from './pages';

export interface IntakeAppDeps {
  client: TriageApiClient;
}

function formField(body: unknown, name: string): string {
  if (typeof body !== 'object' || body === null || !(name in body)) return '';
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : '';
}

/**
 * GET /: show the form and whether the API is reachable.
 */
export function showFormHandler(deps: IntakeAppDeps) {
  return async (_req: Request, res: Response): Promise<void> => {
    const backendAlive = await deps.client.isAlive();
    res.type('html').send(renderIntakePage({ apiBase: deps.client.baseUrl, backendAlive }));
  };
}

/**
 * POST /: validate the form, classify through the API, render the result.
 */
export function submitFormHandler(deps: IntakeAppDeps) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const clientId = formField(req.body, 'client_id');
    const ticket = formField(req.body, 'ticket');
    const page = { apiBase: deps.client.baseUrl, clientId, ticket };

    try {
      const backendAlive = await deps.client.isAlive();

      if (!clientId.trim()) {
        res.status(400).type('html').send(renderIntakePage({
          ...page, backendAlive, warning: 'Please enter a client ID before classification.',
        }));
        return;
      }
      if (!ticket.trim()) {
        res.status(400).type('html').send(renderIntakePage({
          ...page, backendAlive, warning: 'Please enter a ticket before classification.',
        }));
        return;
      }

      try {
        const result = await deps.client.classify({ client_id: clientId.trim(), ticket });
        res.type('html').send(renderIntakePage({ ...page, backendAlive, result }));
      } catch (error) {
        if (!(error instanceof TriageApiError)) throw error;
        console.error('[intake-ui] classification failed:', error.message);
        res.status(502).type('html').send(renderIntakePage({
          ...page, backendAlive, error: `Classification failed: ${error.message}`,
        }));
      }
    } catch (error) {
      next(error);
    }
  };
}

export function createIntakeApp(deps: IntakeAppDeps): Express {
  const app = express();

  app.use(requestLogger('intake-ui'));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  app.get('/', showFormHandler(deps));
  app.post('/', submitFormHandler(deps));

  app.use(errorReportingMiddleware('intake-ui'));
  return app;
}
