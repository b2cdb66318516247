import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { openRegistry } from '../../application/registry.js';
import type { Registry, RegistryOptions } from '../../application/registry.js';

export interface RegistryPluginOptions {
  /** `memory:` or `redis://…`. */
  readonly url: string;
  readonly options?: Partial<RegistryOptions>;
  readonly log: Logger;
}

/**
 * Fastify plugin that manages the registry lifecycle.
 *
 * - Opens the backing store on registration, closes it on server close.
 * - Decorates `fastify.registry` for use by downstream plugins/routes.
 */
async function registryPlugin(fastify: FastifyInstance, opts: RegistryPluginOptions): Promise<void> {
  const registry = await openRegistry(opts.url, opts.options, opts.log.child({ component: 'registry' }));
  await registry.ping();
  opts.log.info({ backend: opts.url.split(':')[0] }, 'Registry opened');

  fastify.decorate('registry', registry);

  fastify.addHook('onClose', async () => {
    await registry.close();
    opts.log.info('Registry closed');
  });
}

export default fp(registryPlugin, {
  name: 'registry',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.registry` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    registry: Registry;
  }
}
