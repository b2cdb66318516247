import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { SourceStatus } from '../../application/registry.js';

/**
 * GET /api/v1/health — registry reachability, source status and task pool
 * counters. 503 when the registry cannot be reached.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let registry: 'up' | 'down' = 'up';
      let sources: SourceStatus[] = [];
      try {
        await fastify.registry.ping();
        sources = await fastify.registry.listSourceStatus();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Registry health check failed');
        registry = 'down';
      }

      const status = registry === 'up' ? 'ok' : 'degraded';
      return reply.status(registry === 'up' ? 200 : 503).send({
        status,
        registry,
        sources,
        tasks: fastify.engine.tasks.stats(),
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['registry', 'engine'],
  fastify: '5.x',
});
