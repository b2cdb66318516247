import { describe, it, expect } from 'vitest';
import { ConfigError, loadEngineConfig, loadWorkerConfig } from '../../../src/infrastructure/config/engine-config.js';

describe('loadEngineConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEngineConfig({})).toEqual({
      HOST: '0.0.0.0',
      PORT: 3000,
      LOG_LEVEL: 'info',
      REGISTRY_URL: 'memory:',
      EVENT_TTL_S: 86_400,
      MAX_EVENTS: 1_000,
      HARD_TTL_S: 604_800,
      SWEEP_INTERVAL_MS: 60_000,
      LEASE_TIMEOUT_MS: 60_000,
      ACQUIRE_TIMEOUT_MS: 30_000,
    });
  });

  it('coerces numbers and treats empty strings as unset', () => {
    const config = loadEngineConfig({ PORT: '8080', MAX_EVENTS: '50', DATABASE_URL: '' });
    expect(config.PORT).toBe(8080);
    expect(config.MAX_EVENTS).toBe(50);
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it('rejects a hard TTL shorter than the event TTL', () => {
    expect(() => loadEngineConfig({ EVENT_TTL_S: '100', HARD_TTL_S: '50' }))
      .toThrow(new ConfigError('Invalid configuration: HARD_TTL_S: must be >= EVENT_TTL_S'));
  });

  it('rejects a short invoke key', () => {
    expect(() => loadEngineConfig({ INVOKE_API_KEY: 'short' })).toThrow(ConfigError);
  });
});

describe('loadWorkerConfig', () => {
  it('applies defaults', () => {
    expect(loadWorkerConfig({ WORKER_CONCURRENCY: '2' })).toEqual({
      LOG_LEVEL: 'info',
      TASK_SOURCE_URL: 'http://localhost:3000',
      WORKER_CONCURRENCY: 2,
      STORAGE_URL: 'memory:',
      ACQUIRE_TIMEOUT_MS: 30_000,
    });
  });
});
