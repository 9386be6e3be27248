import { Express } from 'express';
import { Server } from 'node:http';
import { AddressInfo } from 'node:net';
import type { ClassificationResult } from '@triage/support';

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function listen(app: Express): Promise<RunningServer> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const { port } = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () => new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve()))),
  };
}

export function sampleResult(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    client_id: 'acme',
    summary: 'Payment failure during checkout',
    full_summary: null,
    full_text: 'Payment failed with error 500 during checkout',
    category: 'Payment',
    severity: 'High',
    kb_match: 'ISSUE-001',
    next_step: 'Check the payment gateway logs.',
    analysis_source: 'heuristics',
    llm_raw: null,
    ...overrides,
  };
}
