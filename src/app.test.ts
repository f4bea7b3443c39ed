import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { createApp } from './app';
import { ProjectorConfig, loadConfig } from './utils/config/config';
import { createPlanBody } from './utils/test/mockData';

vi.mock('./utils/logger');
vi.mock('./utils/log');

async function startServer(config: ProjectorConfig): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp(config);
  return new Promise((resolve) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

async function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

describe('Server routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer({ ...loadConfig({}), jwtSecret: '' }));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  it('should return a projection', async () => {
    const response = await postJson(`${baseUrl}/api/projection`, createPlanBody());
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toHaveProperty('ages.length', 61);
    expect(body).toHaveProperty('incomeReal.length', 61);
  });

  it('should map validation errors to 400 with the field', async () => {
    const response = await postJson(`${baseUrl}/api/projection`, createPlanBody({ savingRate: 150 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Saving rate must be between 0 and 100%.',
      field: 'savingRate',
    });
  });

  it('should return CSV with a csv content type', async () => {
    const response = await postJson(`${baseUrl}/api/projection/csv`, createPlanBody({ finalAge: 31 }));

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/csv');
    expect((await response.text()).split('\n')[0]).toBe('Age,Salary,Income,Expenses,Net Worth');
  });

  it('should run a seeded Monte Carlo simulation', async () => {
    const response = await postJson(`${baseUrl}/api/monte_carlo?runs=20&seed=7`, createPlanBody());
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ runs: 20, seed: 7 });
    expect(body).toHaveProperty('allNetWorths.length', 20);
  });

  it('should include terminal net worths in starting-age dollars', async () => {
    const response = await postJson(`${baseUrl}/api/monte_carlo?runs=10&seed=7`, createPlanBody());
    const body = z
      .object({ allNetWorths: z.array(z.number()), allNetWorthsReal: z.array(z.number()) })
      .parse(await response.json());

    // 2% inflation over the 60 years from 30 to 90
    const inflationFactor = Math.pow(1.02, 60);
    expect(body.allNetWorthsReal).toHaveLength(10);
    body.allNetWorthsReal.forEach((value, i) => {
      expect(value).toBeCloseTo(body.allNetWorths[i] / inflationFactor, 6);
    });
  });

  it('should run a background job through to its result', async () => {
    const start = await postJson(`${baseUrl}/api/monte_carlo/simulations?runs=5&seed=3`, createPlanBody());
    const { id } = z.object({ id: z.string() }).parse(await start.json());

    let status = 'pending';
    for (let attempt = 0; attempt < 100 && status !== 'completed'; attempt++) {
      const progress = await fetch(`${baseUrl}/api/monte_carlo/simulations/${id}/status`);
      status = z.object({ status: z.string() }).parse(await progress.json()).status;
      if (status !== 'completed') {
        await new Promise((resolve) => setTimeout(resolve, 10));
      }
    }

    const result = await fetch(`${baseUrl}/api/monte_carlo/simulations/${id}/result`);
    const list = await fetch(`${baseUrl}/api/monte_carlo/simulations`);

    expect(status).toBe('completed');
    expect(result.status).toBe(200);
    const outcome = z
      .object({ runs: z.number(), seed: z.number(), allNetWorthsReal: z.array(z.number()) })
      .parse(await result.json());
    expect(outcome.runs).toBe(5);
    expect(outcome.seed).toBe(3);
    expect(outcome.allNetWorthsReal).toHaveLength(5);
    expect(await list.json()).toEqual(expect.arrayContaining([expect.objectContaining({ id, status: 'completed' })]));
  });

  it('should return 404 for an unknown job', async () => {
    const response = await fetch(`${baseUrl}/api/monte_carlo/simulations/unknown/status`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Simulation with ID unknown not found' });
  });

  it('should return a sensitivity comparison', async () => {
    const response = await postJson(`${baseUrl}/api/sensitivity?variable=extraYearsOfWork&delta=2`, createPlanBody());
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ variable: 'extraYearsOfWork', delta: 2, retirementAgeChange: 2 });
  });

  it('should return a saving rate sweep', async () => {
    const response = await postJson(`${baseUrl}/api/sensitivity/saving_rate_sweep?deltas=-1,1`, createPlanBody());
    const rows = z.array(z.object({ adjustedRate: z.number() })).parse(await response.json());

    expect(rows.map((row) => row.adjustedRate)).toEqual([24, 26]);
  });

  it('should parse a text schedule body', async () => {
    const response = await fetch(`${baseUrl}/api/schedules/savings_rates`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: '30,20;bad;40,35',
    });

    expect(await response.json()).toEqual([
      { age: 30, rate: 20 },
      { age: 40, rate: 35 },
    ]);
  });
});

describe('Server authentication', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer({ ...loadConfig({}), jwtSecret: 'test-secret' }));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  it('should reject requests without a token', async () => {
    const response = await postJson(`${baseUrl}/api/projection`, createPlanBody());

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ message: 'Invalid token' });
  });

  it('should reject a token signed with another secret', async () => {
    const token = jwt.sign({ userId: 1 }, 'other-secret');
    const response = await postJson(`${baseUrl}/api/projection`, createPlanBody(), { Authorization: token });

    expect(response.status).toBe(401);
  });

  it('should accept a valid token', async () => {
    const token = jwt.sign({ userId: 1 }, 'test-secret');
    const response = await postJson(`${baseUrl}/api/projection`, createPlanBody(), { Authorization: token });

    expect(response.status).toBe(200);
  });
});
