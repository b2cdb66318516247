import { randomUUID, timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { TRIGGER_KINDS, createEvent, toWire } from '../../domain/index.js';
import type { TriggerKind } from '../../domain/index.js';
import { eventBatchSchema, toEvent, wireEventSchema } from '../../application/event-schema.js';
import { safeInt } from './params.js';

export interface EventRoutesOptions {
  /** When set, invoke requests bearing this token are marked authenticated. */
  readonly apiKey?: string | undefined;
}

function isTriggerKind(value: string): value is TriggerKind {
  return TRIGGER_KINDS.some((t) => t === value);
}

function bearerMatches(header: string | undefined, apiKey: string | undefined): boolean {
  if (apiKey === undefined || header === undefined) return false;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  if (match?.[1] === undefined) return false;

  const given = Buffer.from(match[1]);
  const expected = Buffer.from(apiKey);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

/**
 * Event intake and event log routes.
 *
 * POST /api/v1/events        — single canonical event
 * POST /api/v1/events/batch  — array of canonical events, all or nothing
 * GET  /api/v1/events        — retained events of one trigger class
 * ALL  /api/v1/invoke/*      — HTTP trigger request
 *
 * Intake goes through the engine's request source, so a 202 means the event
 * has been registered and matched.
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  const { intake } = fastify.engine;

  // ── POST /api/v1/events ─────────────────────────────────
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = wireEventSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const event = toEvent(parsed.data);
      await intake.submit(event);

      return reply.status(202).send({ status: 'accepted', event_id: event.data.id });
    },
  );

  // ── POST /api/v1/events/batch ───────────────────────────
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      const events = parsed.data.map(toEvent);
      // Queued synchronously in array order
      await Promise.all(events.map((event) => intake.submit(event)));

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        event_ids: events.map((e) => e.data.id),
      });
    },
  );

  // ── GET /api/v1/events ──────────────────────────────────
  fastify.get(
    '/api/v1/events',
    async (
      request: FastifyRequest<{ Querystring: { trigger?: string; from?: string; to?: string } }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      if (q.trigger === undefined || !isTriggerKind(q.trigger)) {
        return reply.status(400).send({ error: `trigger must be one of ${TRIGGER_KINDS.join(', ')}` });
      }
      const from = safeInt(q.from);
      const to = safeInt(q.to);
      if ((from !== undefined && Number.isNaN(from)) || (to !== undefined && Number.isNaN(to))) {
        return reply.status(400).send({ error: 'from and to must be unix seconds' });
      }
      if (from !== undefined && to !== undefined && from > to) {
        return reply.status(400).send({ error: 'from must be before to' });
      }

      const events = await fastify.registry.getEventsByTrigger(q.trigger, { from, to });
      return reply.status(200).send({
        data: events.map((e) => ({ key: e.key, stored_at: e.stored_at, event: toWire(e.event) })),
        count: events.length,
      });
    },
  );

  // ── ALL /api/v1/invoke/* ────────────────────────────────
  fastify.all(
    '/api/v1/invoke/*',
    async (
      request: FastifyRequest<{ Params: { '*': string }; Querystring: Record<string, string> }>,
      reply: FastifyReply,
    ) => {
      const event = createEvent({
        trigger: 'request',
        source: 'request',
        id: randomUUID(),
        payload: {
          path: `/${request.params['*']}`,
          method: request.method,
          query: request.query,
          body: request.body ?? null,
          authenticated: bearerMatches(request.headers.authorization, opts.apiKey),
        },
      });
      await intake.submit(event);

      return reply.status(202).send({ status: 'accepted', event_id: event.data.id });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['registry', 'engine'],
  fastify: '5.x',
});
