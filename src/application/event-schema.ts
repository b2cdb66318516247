import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { BLOCKCHAIN_EVENT_TYPES, SOURCE_KINDS, TRIGGER_KINDS, createEvent, nowSeconds } from '../domain/index.js';
import type { Event } from '../domain/index.js';

/**
 * Zod schema for the canonical wire shape of an inbound event.
 *
 * - `data.id` is optional at ingestion; a UUID is assigned if absent.
 * - `triggered_time` is unix seconds and defaults to the intake time.
 * - `payload` is open-ended JSON; it is converted to the payload value model.
 */
export const wireEventSchema = z.object({
  context: z.object({
    trigger: z.enum(TRIGGER_KINDS),
    triggered_time: z.number().int().nonnegative().optional(),
    source: z.enum(SOURCE_KINDS),
    event_type: z.enum(BLOCKCHAIN_EVENT_TYPES).optional(),
  }),
  data: z.object({
    id: z.string().min(1).max(512).optional(),
    payload: z.unknown().default({}),
  }),
});

/** Inferred type representing a validated-but-incomplete event (no guaranteed id). */
export type EventInput = z.infer<typeof wireEventSchema>;

export const eventBatchSchema = z
  .array(wireEventSchema)
  .min(1, 'Batch must contain at least one event')
  .max(1000, 'Batch must contain at most 1000 events');

export function toEvent(input: EventInput): Event {
  return createEvent({
    trigger: input.context.trigger,
    source: input.context.source,
    event_type: input.context.event_type,
    triggered_time: input.context.triggered_time ?? nowSeconds(),
    id: input.data.id ?? randomUUID(),
    payload: input.data.payload,
  });
}
