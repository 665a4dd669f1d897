import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { buildApp } from '../../src/app.js';
import { ok } from '../../src/domain/index.js';
import { loadDashboardConfig } from '../../src/infrastructure/config.js';

// Every path exists and is a file, but nothing can be read.
vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    existsSync: vi.fn(() => true),
    statSync: vi.fn(() => ({ isFile: () => true })),
    readFileSync: vi.fn(() => {
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    }),
  };
});

let app: FastifyInstance;

beforeEach(async () => {
  app = await buildApp({
    config: loadDashboardConfig({ LIVE_STREAM: 'false' }),
    log: pino({ level: 'silent' }),
    client: {
      fetchMetrics: vi.fn().mockResolvedValue(ok({})),
      sendEvent: vi.fn().mockResolvedValue(ok(undefined)),
    },
    distDir: '/srv/dashboard-dist',
  });
});

afterEach(async () => {
  await app.close();
});

describe('dashboard static assets', () => {
  it('answers 404 when an asset cannot be read', async () => {
    const res = await app.inject({ method: 'GET', url: '/dashboard/assets/index.js' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Not found' });
  });

  it('answers 404 when the SPA entry cannot be read', async () => {
    const res = await app.inject({ method: 'GET', url: '/dashboard' });

    expect(res.statusCode).toBe(404);
  });
});
