import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { toWire } from '../../domain/index.js';
import {
  ackRequestSchema,
  acquireFuncRequestSchema,
  acquireTaskRequestSchema,
  releaseRequestSchema,
} from '../../application/task-schema.js';

/**
 * Task Source RPC used by remote workers.
 *
 * POST /api/v1/tasks/acquire             — long-poll for a task; 204 when none
 * POST /api/v1/tasks/:task_id/ack        — complete a lease with its outcome
 * POST /api/v1/tasks/:task_id/release    — hand a lease back unexecuted
 * POST /api/v1/functions/:fid/acquire    — executable code for a function
 */
async function taskRoutes(fastify: FastifyInstance): Promise<void> {
  const { tasks } = fastify.engine;

  // ── POST /api/v1/tasks/acquire ──────────────────────────
  fastify.post(
    '/api/v1/tasks/acquire',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = acquireTaskRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }
      const { uid, fid_hint, timeout_ms } = parsed.data;

      // Client gone before a task arrived: drop the waiter
      const ac = new AbortController();
      const onClose = (): void => {
        if (!reply.raw.writableEnded) ac.abort();
      };
      reply.raw.on('close', onClose);

      try {
        const assignment = await tasks.acquireTask(uid, fid_hint, { signal: ac.signal, timeoutMs: timeout_ms });
        if (assignment === null) {
          return reply.status(204).send();
        }
        if (ac.signal.aborted) {
          await tasks.release(assignment.task_id, uid);
          return reply.status(204).send();
        }
        return reply.status(200).send({ ...assignment, event: toWire(assignment.event) });
      } finally {
        reply.raw.off('close', onClose);
      }
    },
  );

  // ── POST /api/v1/tasks/:task_id/ack ─────────────────────
  fastify.post(
    '/api/v1/tasks/:task_id/ack',
    async (request: FastifyRequest<{ Params: { task_id: string }; Body: unknown }>, reply: FastifyReply) => {
      const parsed = ackRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const { uid, ...report } = parsed.data;
      await tasks.acknowledge(request.params.task_id, uid, report);
      return reply.status(204).send();
    },
  );

  // ── POST /api/v1/tasks/:task_id/release ─────────────────
  fastify.post(
    '/api/v1/tasks/:task_id/release',
    async (request: FastifyRequest<{ Params: { task_id: string }; Body: unknown }>, reply: FastifyReply) => {
      const parsed = releaseRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const released = await tasks.release(request.params.task_id, parsed.data.uid);
      return reply.status(200).send({ released });
    },
  );

  // ── POST /api/v1/functions/:fid/acquire ─────────────────
  fastify.post(
    '/api/v1/functions/:fid/acquire',
    async (request: FastifyRequest<{ Params: { fid: string }; Body: unknown }>, reply: FastifyReply) => {
      const parsed = acquireFuncRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const func = await tasks.acquireFunc(parsed.data.uid, request.params.fid);
      return reply.status(200).send(func);
    },
  );
}

export default fp(taskRoutes, {
  name: 'task-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
