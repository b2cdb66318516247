import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { InMemoryExecutionLog } from '../../application/execution-log.js';
import type { ExecutionRecorder } from '../../application/execution-log.js';
import { createDbClient, ensureSchema } from './client.js';
import { PgExecutionLog } from './pg-execution-log.js';

export interface DbPluginOptions {
  /** Without a URL the execution log is kept in memory. */
  readonly databaseUrl?: string | undefined;
  readonly log: Logger;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.executions` with the execution log.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  if (opts.databaseUrl === undefined) {
    fastify.decorate('executions', new InMemoryExecutionLog());
    opts.log.info('No DATABASE_URL; execution log kept in memory');
    return;
  }

  const { sql, db } = createDbClient(opts.databaseUrl);
  await ensureSchema(sql);
  opts.log.info('Database connected');

  fastify.decorate('executions', new PgExecutionLog(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    opts.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.executions` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    executions: ExecutionRecorder;
  }
}
