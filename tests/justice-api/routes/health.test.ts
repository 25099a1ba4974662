import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import express from 'express';
import { z } from 'zod';
import healthRouter from '@api/routes/health';

let server: Server;
let baseUrl: string;

const healthBody = z.object({
  success: z.literal(true),
  data: z.object({
    status: z.string(),
    service: z.string(),
    websocketUsers: z.number(),
    timestamp: z.string(),
  }),
});

beforeAll(async () => {
  const app = express().use(healthRouter);
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', resolve);
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

describe('health router', () => {
  it('reports the service as up with no sockets attached', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);

    const body = healthBody.parse(await res.json());
    expect(body.data.status).toBe('ok');
    expect(body.data.service).toBe('court-custody-api');
    expect(body.data.websocketUsers).toBe(0);
    expect(Number.isNaN(Date.parse(body.data.timestamp))).toBe(false);
  });

  it('answers only on /health', async () => {
    const res = await fetch(`${baseUrl}/status`);
    expect(res.status).toBe(404);
  });
});
