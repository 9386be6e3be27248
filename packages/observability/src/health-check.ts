import { Router, Request, Response } from 'express';

export interface DependencyStatus {
  name: string;
  status: 'healthy' | 'degraded' | 'down';
  latencyMs?: number;
  error?: string;
  detail?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'down';
  timestamp: string;
  uptime: number;
  dependencies: DependencyStatus[];
}

export interface ProbeResult {
  status?: DependencyStatus['status'];
  detail?: string;
}

/**
 * A named dependency probe. Throwing marks the dependency down; returning a
 * status lets the probe report degraded states itself.
 */
export interface DependencyCheck {
  name: string;
  check: () => Promise<ProbeResult>;
}

export interface HealthRouterOptions {
  service: string;
  checks?: DependencyCheck[];
}

const startTime = Date.now();

/**
 * Quick health check: just confirms the service is running.
 */
export function healthCheck(): HealthStatus {
  return {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: Date.now() - startTime,
    dependencies: [],
  };
}

/**
 * Deep health check: runs every probe and reports latency.
 */
export async function deepHealthCheck(checks: DependencyCheck[]): Promise<HealthStatus> {
  const deps = await Promise.all(checks.map(runCheck));

  const hasDown = deps.some(d => d.status === 'down');
  const hasDegraded = deps.some(d => d.status === 'degraded');

  return {
    status: hasDown ? 'down' : hasDegraded ? 'degraded' : 'healthy',
    timestamp: new Date().toISOString(),
    uptime: Date.now() - startTime,
    dependencies: deps,
  };
}

async function runCheck(probe: DependencyCheck): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const result = await probe.check();
    return {
      name: probe.name,
      status: result.status ?? 'healthy',
      ...(result.detail ? { detail: result.detail } : {}),
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    return {
      name: probe.name,
      status: 'down',
      latencyMs: Date.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Express router with `/` (liveness, no side effects) and `/health/deep`.
 */
export function healthRouter(options: HealthRouterOptions): Router {
  const router = Router();
  const checks = options.checks ?? [];

  router.get('/', (_req: Request, res: Response) => {
    const { timestamp, uptime } = healthCheck();
    res.json({ status: 'ok', message: `${options.service} is running.`, uptime, timestamp });
  });

  router.get('/health/deep', async (_req: Request, res: Response) => {
    const status = await deepHealthCheck(checks);
    res.status(status.status === 'down' ? 503 : 200).json(status);
  });

  return router;
}
