import express from 'express';
import { AddressInfo } from 'node:net';
import { Server } from 'node:http';
import { DependencyCheck, deepHealthCheck, healthCheck, healthRouter } from '../src';

describe('healthCheck', () => {
  it('reports healthy with no dependencies', () => {
    const status = healthCheck();
    expect(status.status).toBe('healthy');
    expect(status.dependencies).toEqual([]);
    expect(status.uptime).toBeGreaterThanOrEqual(0);
  });
});

describe('deepHealthCheck', () => {
  const ok: DependencyCheck = { name: 'knowledge_base', check: async () => ({ detail: '8 entries' }) };
  const degraded: DependencyCheck = { name: 'llm', check: async () => ({ status: 'degraded', detail: 'heuristics only' }) };
  const down: DependencyCheck = {
    name: 'firestore',
    check: async () => {
      throw new Error('permission denied');
    },
  };

  it('is healthy when every probe passes', async () => {
    const status = await deepHealthCheck([ok]);
    expect(status.status).toBe('healthy');
    expect(status.dependencies[0]).toMatchObject({ name: 'knowledge_base', status: 'healthy', detail: '8 entries' });
  });

  it('is degraded when a probe says so', async () => {
    expect((await deepHealthCheck([ok, degraded])).status).toBe('degraded');
  });

  it('is down when a probe throws', async () => {
    const status = await deepHealthCheck([ok, degraded, down]);
    expect(status.status).toBe('down');
    expect(status.dependencies[2]).toMatchObject({ name: 'firestore', status: 'down', error: 'permission denied' });
  });
});

describe('healthRouter', () => {
  let server: Server;
  let baseUrl: string;
  const probe = jest.fn<ReturnType<DependencyCheck['check']>, []>();

  beforeAll(async () => {
    const app = express();
    app.use(healthRouter({ service: 'Test API', checks: [{ name: 'store', check: probe }] }));
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => probe.mockReset());

  it('answers the liveness check without running probes', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', message: 'Test API is running.' });
    expect(probe).not.toHaveBeenCalled();
  });

  it('answers 503 from the deep check when a dependency is down', async () => {
    probe.mockRejectedValue(new Error('unreachable'));

    const response = await fetch(`${baseUrl}/health/deep`);

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: 'down',
      dependencies: [{ name: 'store', status: 'down', error: 'unreachable' }],
    });
  });

  it('answers 200 from the deep check when dependencies are only degraded', async () => {
    probe.mockResolvedValue({ status: 'degraded' });

    const response = await fetch(`${baseUrl}/health/deep`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'degraded' });
  });
});
