import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { DashboardService } from '../application/dashboard-service.js';
import type { DashboardConfig } from './config.js';
import { MetricsClient, type EventSink, type MetricsSource } from './metrics-client.js';

export interface DashboardPluginOptions {
  config: DashboardConfig;
  log: Logger;
  /** Defaults to a MetricsClient pointed at `config.backendUrl`. */
  client?: MetricsSource & EventSink;
}

/**
 * Fastify plugin that owns the dashboard session lifecycle.
 *
 * - Builds the service (session + scheduler) once per server.
 * - Arms auto-refresh when the server is ready, disarms it on close.
 * - Decorates `fastify.dashboard` for the routes.
 */
async function dashboardPlugin(fastify: FastifyInstance, opts: DashboardPluginOptions): Promise<void> {
  const { config } = opts;

  const client =
    opts.client ??
    new MetricsClient({
      baseUrl: config.backendUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      ingestTimeoutMs: config.ingestTimeoutMs,
    });

  const service = new DashboardService({
    client,
    config,
    log: opts.log.child({ component: 'dashboard' }),
  });

  fastify.decorate('dashboard', service);

  fastify.addHook('onReady', async () => {
    service.start();
    fastify.log.info(
      { backendUrl: config.backendUrl, liveStream: service.getSettings().liveStream },
      'Dashboard session started',
    );
  });

  fastify.addHook('onClose', async () => {
    service.stop();
    fastify.log.info('Dashboard session discarded');
  });
}

export default fp(dashboardPlugin, {
  name: 'dashboard',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.dashboard` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    dashboard: DashboardService;
  }
}
