import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { readFileSync, existsSync, statSync } from 'node:fs';
import { resolve, join, extname, sep } from 'node:path';

import {
  dashboardPlugin,
  type DashboardConfig,
  type EventSink,
  type MetricsSource,
} from './infrastructure/index.js';

import {
  dashboardRoutes,
  settingsRoutes,
  burstRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

export interface BuildAppOptions {
  config: DashboardConfig;
  log: Logger;
  client?: MetricsSource & EventSink;
  /** Directory holding the built SPA. Defaults to public/dist under cwd. */
  distDir?: string;
}

const MIME: Record<string, string> = {
  '.html': 'text/html',
  '.js':   'application/javascript',
  '.css':  'text/css',
  '.json': 'application/json',
  '.svg':  'image/svg+xml',
  '.png':  'image/png',
  '.ico':  'image/x-icon',
  '.map':  'application/json',
};

/**
 * Assemble the Fastify server without listening.
 *
 * Order:
 * 1) Dashboard session plugin
 * 2) Dashboard SPA static assets
 * 3) HTTP routes
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  // One pino instance for the server and the session; its level comes from config.
  const logger: FastifyBaseLogger = options.log;
  const fastify = Fastify({ loggerInstance: logger });

  // --------------------------------------------------
  // Session
  // --------------------------------------------------

  await fastify.register(dashboardPlugin, {
    config: options.config,
    log: options.log,
    client: options.client,
  });

  // --------------------------------------------------
  // Dashboard — Serve React SPA static assets
  // --------------------------------------------------

  const distDir = options.distDir ?? resolve(process.cwd(), 'public', 'dist');

  const sendIndex = (reply: FastifyReply) => {
    try {
      const html = readFileSync(resolve(distDir, 'index.html'), 'utf-8');
      return reply.type('text/html').send(html);
    } catch {
      fastify.log.warn({ distDir }, 'Dashboard build not found');
      return reply.status(404).send({ error: 'Dashboard not found — run: npm run build:frontend' });
    }
  };

  /**
   * GET /dashboard          → index.html (SPA entry)
   * GET /dashboard/assets/* → JS/CSS bundles
   */
  fastify.get('/dashboard', (_req, reply) => sendIndex(reply));

  fastify.get('/dashboard/*', (req, reply) => {
    const urlPath = (req.url.replace('/dashboard/', '') || '').split('?')[0] ?? '';
    const filePath = join(distDir, urlPath);

    // Reject path traversal
    if (filePath !== distDir && !filePath.startsWith(distDir + sep)) {
      return reply.status(403).send({ error: 'Forbidden' });
    }

    try {
      if (!existsSync(filePath) || !statSync(filePath).isFile()) {
        // SPA fallback
        return sendIndex(reply);
      }

      const mime = MIME[extname(filePath)] ?? 'application/octet-stream';
      const content = readFileSync(filePath);
      return reply.type(mime).send(content);
    } catch (err: unknown) {
      // Unreadable, or gone between the stat and the read.
      fastify.log.warn({ err, path: urlPath }, 'Dashboard asset not readable');
      return reply.status(404).send({ error: 'Not found' });
    }
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(dashboardRoutes);
  await fastify.register(settingsRoutes);
  await fastify.register(burstRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
