import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { EXECUTION_OUTCOMES, isExecutionOutcome } from '../../domain/index.js';
import { listExecutions } from '../../application/query-executions.js';
import { UUID_RE, safeInt } from './params.js';

/**
 * GET /api/v1/executions — execution records, newest first
 *
 * Query params: function_id, event_id, outcome, limit, offset
 */
async function executionRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/executions',
    async (
      request: FastifyRequest<{
        Querystring: {
          function_id?: string;
          event_id?: string;
          outcome?: string;
          limit?: string;
          offset?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }
      if (q.function_id !== undefined && !UUID_RE.test(q.function_id)) {
        return reply.status(400).send({ error: 'function_id must be a valid UUID' });
      }
      if (q.outcome !== undefined && !isExecutionOutcome(q.outcome)) {
        return reply.status(400).send({ error: `outcome must be one of ${EXECUTION_OUTCOMES.join(', ')}` });
      }

      const result = await listExecutions(fastify.executions, {
        limit,
        offset,
        function_id: q.function_id,
        event_id: q.event_id,
        outcome: q.outcome,
      });
      return reply.status(200).send(result);
    },
  );
}

export default fp(executionRoutes, {
  name: 'execution-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
