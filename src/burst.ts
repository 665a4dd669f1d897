import pino from 'pino';
import { loadDashboardConfig, MetricsClient } from './infrastructure/index.js';
import { sendBurst, BURST_SIZE } from './application/index.js';

/**
 * Standalone burst sender.
 *
 * Fires one burst of synthetic log records at the backend's ingest endpoint,
 * waits for every send to settle (delivered or not) and exits. Same records
 * and semantics as the dashboard's "Generate Burst Logs" action.
 *
 * Usage: npm run burst [-- <count>]
 */
function parseCount(raw: string | undefined): number {
  if (raw === undefined) return BURST_SIZE;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Burst count must be a positive integer, got "${raw}"`);
  }
  return n;
}

async function main(): Promise<void> {
  const config = loadDashboardConfig();
  const log = pino({ level: config.logLevel });
  const count = parseCount(process.argv[2]);

  const client = new MetricsClient({
    baseUrl: config.backendUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    ingestTimeoutMs: config.ingestTimeoutMs,
  });

  const receipt = sendBurst(client, log, { count });
  await receipt.settled;

  log.info({ attempted: receipt.attempted, backendUrl: config.backendUrl }, 'Burst sent to API');
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Burst failed');
  process.exit(1);
});
