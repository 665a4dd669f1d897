import pino from 'pino';
import { loadDashboardConfig } from './infrastructure/index.js';
import { buildApp } from './app.js';

/**
 * Bootstrap the dashboard server.
 *
 * Order:
 * 1) Configuration (fatal when invalid)
 * 2) Root logger at the validated level
 * 3) Server assembly
 * 4) Shutdown hooks
 * 5) listen() — the session starts polling once the server is ready
 */
async function main(): Promise<void> {
  const config = loadDashboardConfig();
  const log = pino({ level: config.logLevel });

  const fastify = await buildApp({ config, log });

  // Graceful shutdown on SIGINT / SIGTERM: stops the refresh timer via onClose.
  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down dashboard server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  // No validated level to honour here: configuration itself may be what failed.
  pino().fatal({ err }, 'Failed to start dashboard server');

  process.exit(1);

});
