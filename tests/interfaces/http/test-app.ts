import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../src/app.js';
import { loadEngineConfig } from '../../../src/infrastructure/config/engine-config.js';
import { silentLogger } from '../../helpers.js';

/** Engine with an in-memory registry and execution log and no sources besides HTTP intake. */
export function testApp(env: NodeJS.ProcessEnv = {}): Promise<FastifyInstance> {
  return buildApp({
    config: loadEngineConfig(env),
    log: silentLogger(),
    sources: { restart_delay_ms: 0, sources: [] },
    adapters: [],
  });
}

export const CODE = 'function handler(event) { return event.data.id; }';
