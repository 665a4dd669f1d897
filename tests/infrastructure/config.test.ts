import { describe, it, expect } from 'vitest';
import { loadDashboardConfig } from '../../src/infrastructure/config.js';
import { ConfigError } from '../../src/infrastructure/errors.js';

describe('loadDashboardConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadDashboardConfig({})).toEqual({
      backendUrl: 'http://localhost:8000',
      requestTimeoutMs: 3000,
      ingestTimeoutMs: 1000,
      refreshIntervalMs: 5000,
      sensitivity: 1.5,
      liveStream: true,
      host: '0.0.0.0',
      port: 3000,
      logLevel: 'info',
    });
  });

  it('reads overrides', () => {
    const config = loadDashboardConfig({
      BACKEND_URL: 'http://metrics.internal:9000',
      REQUEST_TIMEOUT_MS: '1500',
      REFRESH_INTERVAL_MS: '2000',
      SENSITIVITY: '2.5',
      LIVE_STREAM: 'false',
      PORT: '8080',
      LOG_LEVEL: 'debug',
    });

    expect(config.backendUrl).toBe('http://metrics.internal:9000');
    expect(config.requestTimeoutMs).toBe(1500);
    expect(config.refreshIntervalMs).toBe(2000);
    expect(config.sensitivity).toBe(2.5);
    expect(config.liveStream).toBe(false);
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('accepts 1 and 0 for the live-stream flag', () => {
    expect(loadDashboardConfig({ LIVE_STREAM: '0' }).liveStream).toBe(false);
    expect(loadDashboardConfig({ LIVE_STREAM: '1' }).liveStream).toBe(true);
  });

  it('treats empty strings as unset', () => {
    expect(loadDashboardConfig({ BACKEND_URL: '', PORT: '' }).backendUrl).toBe('http://localhost:8000');
  });

  it('validates LOG_LEVEL before anything logs with it', () => {
    expect(() => loadDashboardConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(loadDashboardConfig({ LOG_LEVEL: '' }).logLevel).toBe('info');
  });

  it('ignores unrelated variables', () => {
    expect(loadDashboardConfig({ HOME: '/root', PATH: '/usr/bin' }).port).toBe(3000);
  });

  it('rejects sensitivity outside [0.5, 3.0]', () => {
    expect(() => loadDashboardConfig({ SENSITIVITY: '5' })).toThrow(ConfigError);
  });

  it('names every invalid variable', () => {
    try {
      loadDashboardConfig({ SENSITIVITY: '0.1', REFRESH_INTERVAL_MS: 'soon', BACKEND_URL: 'not a url' });
      expect.unreachable('loadDashboardConfig should have thrown');
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(ConfigError);
      if (!(e instanceof ConfigError)) return;
      const names = e.issues.map((i) => i.split(':')[0]).sort();
      expect(names).toEqual(['BACKEND_URL', 'REFRESH_INTERVAL_MS', 'SENSITIVITY']);
    }
  });
});
