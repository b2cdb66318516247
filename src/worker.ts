import { hostname } from 'node:os';
import pino from 'pino';
import { WorkerExecutor } from './application/executor.js';
import {
  HttpTaskSourceClient,
  KeyValueFunctionStorage,
  WorkerSandbox,
  loadWorkerConfig,
  openKeyValueStore,
} from './infrastructure/index.js';

/**
 * Standalone worker process that pulls tasks from the engine and runs them
 * in sandboxed threads.
 *
 * Scales horizontally: launch more instances with distinct WORKER_ID values.
 */
const config = loadWorkerConfig();
const log = pino({ level: config.LOG_LEVEL });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const uid = config.WORKER_ID ?? `${hostname()}-${process.pid}`;

  const kv = await openKeyValueStore(config.STORAGE_URL);
  log.info({ backend: config.STORAGE_URL.split(':')[0] }, 'Function storage opened');

  const executor = new WorkerExecutor(
    {
      source: new HttpTaskSourceClient({
        baseUrl: config.TASK_SOURCE_URL,
        acquireTimeoutMs: config.ACQUIRE_TIMEOUT_MS,
      }),
      sandbox: new WorkerSandbox(log.child({ component: 'sandbox' })),
      storage: new KeyValueFunctionStorage(kv),
      log: log.child({ uid }),
    },
    { uid, concurrency: config.WORKER_CONCURRENCY },
  );

  try {
    await executor.run(ac.signal);
  } finally {
    await kv.close();
  }
}

// Graceful shutdown on SIGINT / SIGTERM: slots finish their current task
function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    log.fatal({ err }, 'Worker crashed');
    process.exit(1);
  });
