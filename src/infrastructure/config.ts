import { z } from 'zod';
import {
  DEFAULT_SENSITIVITY,
  SENSITIVITY_MAX,
  SENSITIVITY_MIN,
} from '../domain/index.js';
import { ConfigError } from './errors.js';

/**
 * Process configuration read from environment variables.
 */
export interface DashboardConfig {
  backendUrl: string;
  requestTimeoutMs: number;
  ingestTimeoutMs: number;
  refreshIntervalMs: number;
  sensitivity: number;
  liveStream: boolean;
  host: string;
  port: number;
  logLevel: string;
}

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  BACKEND_URL: z.string().url().default('http://localhost:8000'),
  REQUEST_TIMEOUT_MS: millis(3_000),
  INGEST_TIMEOUT_MS: millis(1_000),
  REFRESH_INTERVAL_MS: millis(5_000),
  SENSITIVITY: z.coerce.number().min(SENSITIVITY_MIN).max(SENSITIVITY_MAX).default(DEFAULT_SENSITIVITY),
  LIVE_STREAM: flag(true),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Validates the environment and returns typed configuration.
 *
 * Unset variables take their defaults. Empty strings are treated as unset.
 * Throws ConfigError naming every invalid variable.
 */
export function loadDashboardConfig(
  env: Record<string, string | undefined> = process.env,
): DashboardConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }

  const e = parsed.data;
  return {
    backendUrl: e.BACKEND_URL,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    ingestTimeoutMs: e.INGEST_TIMEOUT_MS,
    refreshIntervalMs: e.REFRESH_INTERVAL_MS,
    sensitivity: e.SENSITIVITY,
    liveStream: e.LIVE_STREAM,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}
