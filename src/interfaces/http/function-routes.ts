import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { TRIGGER_TYPES } from '../../domain/index.js';
import type { TriggerType } from '../../domain/index.js';
import { registerFunctionSchema, patchFunctionSchema } from '../../application/function-schema.js';
import {
  createFunction,
  listFunctions,
  getFunction,
  patchFunction,
  removeFunction,
} from '../../application/function-crud.js';
import { UUID_RE, safeInt } from './params.js';

function isTriggerType(value: string): value is TriggerType {
  return TRIGGER_TYPES.some((t) => t === value);
}

/**
 * Function registration routes.
 *
 * POST   /api/v1/functions      — register function (version 1)
 * GET    /api/v1/functions      — paginated list, optional trigger_type filter
 * GET    /api/v1/functions/:id  — single function with code
 * PATCH  /api/v1/functions/:id  — partial update, bumps version
 * DELETE /api/v1/functions/:id  — delete function and its code versions
 */
async function functionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/functions ──────────────────────────────
  fastify.post(
    '/api/v1/functions',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = registerFunctionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const metadata = await createFunction(fastify.registry, parsed.data);
      request.log.info({ function_id: metadata.id, trigger: metadata.trigger.type }, 'Function registered');
      return reply.status(201).send(metadata);
    },
  );

  // ── GET /api/v1/functions ───────────────────────────────
  fastify.get(
    '/api/v1/functions',
    async (
      request: FastifyRequest<{
        Querystring: { trigger_type?: string; page_token?: string; page_size?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const pageSize = safeInt(q.page_size);
      if (pageSize !== undefined && Number.isNaN(pageSize)) {
        return reply.status(400).send({ error: 'page_size must be an integer' });
      }
      if (q.trigger_type !== undefined && !isTriggerType(q.trigger_type)) {
        return reply.status(400).send({ error: `trigger_type must be one of ${TRIGGER_TYPES.join(', ')}` });
      }

      const result = await listFunctions(fastify.registry, {
        trigger_type: q.trigger_type,
        page_token: q.page_token,
        page_size: pageSize,
      });
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/functions/:id ───────────────────────────
  fastify.get(
    '/api/v1/functions/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const { id } = request.params;
      if (!UUID_RE.test(id)) {
        return reply.status(400).send({ error: 'id must be a valid UUID' });
      }

      const metadata = await getFunction(fastify.registry, id);
      if (metadata === null) {
        return reply.status(404).send({ error: 'Function not found' });
      }
      return reply.status(200).send(metadata);
    },
  );

  // ── PATCH /api/v1/functions/:id ─────────────────────────
  fastify.patch(
    '/api/v1/functions/:id',
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const { id } = request.params;
      if (!UUID_RE.test(id)) {
        return reply.status(400).send({ error: 'id must be a valid UUID' });
      }

      const parsed = patchFunctionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const metadata = await patchFunction(fastify.registry, id, parsed.data);
      request.log.info({ function_id: id, version: metadata.version }, 'Function updated');
      return reply.status(200).send(metadata);
    },
  );

  // ── DELETE /api/v1/functions/:id ────────────────────────
  fastify.delete(
    '/api/v1/functions/:id',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const { id } = request.params;
      if (!UUID_RE.test(id)) {
        return reply.status(400).send({ error: 'id must be a valid UUID' });
      }

      const deleted = await removeFunction(fastify.registry, id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Function not found' });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(functionRoutes, {
  name: 'function-routes',
  dependencies: ['registry'],
  fastify: '5.x',
});
