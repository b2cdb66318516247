import pino from 'pino';
import { loadEngineConfig } from './infrastructure/index.js';
import { buildApp } from './app.js';

/**
 * Engine process: registry, sources, matcher, task source and HTTP API.
 * Workers run separately (see worker.ts) and pull tasks over HTTP.
 */
async function main(): Promise<void> {
  const config = loadEngineConfig();
  const log = pino({ level: config.LOG_LEVEL });

  const fastify = await buildApp({ config, log });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    fastify.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ host: config.HOST, port: config.PORT });
}

main().catch((err: unknown) => {
  // pino may not exist yet if configuration failed
  console.error('Fatal: failed to start engine', err);
  process.exit(1);
});
