import { fromJson, toJson, EMPTY_MAP } from './value.js';
import type { JsonValue, Value } from './value.js';

/**
 * Core domain types for the engine's event model.
 *
 * These types define the canonical shape of an event as it flows from a
 * source adapter through the registry and matcher to a worker. They carry
 * no framework dependencies.
 */

/** Trigger class of an event. Literally equal to the function trigger type it can match. */
export const TRIGGER_KINDS = ['blockchain', 'schedule', 'request', 'oracle'] as const;
export type TriggerKind = (typeof TRIGGER_KINDS)[number];

export const SOURCE_KINDS = ['neo', 'ethereum', 'timer', 'request', 'oracle', 'mock'] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export const BLOCKCHAIN_EVENT_TYPES = ['block', 'transaction', 'notification', 'application_log'] as const;
export type BlockchainEventType = (typeof BLOCKCHAIN_EVENT_TYPES)[number];

export interface EventContext {
  readonly trigger: TriggerKind;
  /** Unix seconds. */
  readonly triggered_time: number;
  readonly source: SourceKind;
  readonly event_type?: BlockchainEventType;
}

export interface EventData {
  readonly id: string;
  readonly payload: Value;
}

/**
 * Canonical Event entity.
 *
 * `data.id` is unique per (source, trigger) for as long as the event is
 * retained; the registry refuses a second event with the same triple.
 */
export interface Event {
  readonly context: EventContext;
  readonly data: EventData;
}

/** JSON shape used on HTTP bodies, Redis streams and stored records. */
export interface WireEvent {
  context: {
    trigger: TriggerKind;
    triggered_time: number;
    source: SourceKind;
    event_type?: BlockchainEventType;
  };
  data: {
    id: string;
    payload: JsonValue;
  };
}

export interface CreateEventParams {
  trigger: TriggerKind;
  source: SourceKind;
  id: string;
  payload?: unknown;
  triggered_time?: number;
  event_type?: BlockchainEventType | undefined;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function createEvent(params: CreateEventParams): Event {
  const context: EventContext = params.event_type === undefined
    ? { trigger: params.trigger, triggered_time: params.triggered_time ?? nowSeconds(), source: params.source }
    : {
      trigger: params.trigger,
      triggered_time: params.triggered_time ?? nowSeconds(),
      source: params.source,
      event_type: params.event_type,
    };

  return {
    context,
    data: { id: params.id, payload: fromJson(params.payload ?? {}) ?? EMPTY_MAP },
  };
}

export function toWire(event: Event): WireEvent {
  const context: WireEvent['context'] = {
    trigger: event.context.trigger,
    triggered_time: event.context.triggered_time,
    source: event.context.source,
  };
  if (event.context.event_type !== undefined) context.event_type = event.context.event_type;

  return {
    context,
    data: { id: event.data.id, payload: toJson(event.data.payload) },
  };
}

export function fromWire(wire: WireEvent): Event {
  return createEvent({
    trigger: wire.context.trigger,
    source: wire.context.source,
    triggered_time: wire.context.triggered_time,
    event_type: wire.context.event_type,
    id: wire.data.id,
    payload: wire.data.payload,
  });
}
