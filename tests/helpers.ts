import pino from 'pino';
import type { Logger } from 'pino';
import { DEFAULT_RESOURCES, createEvent } from '../src/domain/index.js';
import type { BlockchainEventType, Event, FunctionInput, SingleTrigger, SourceKind, TriggerConfig } from '../src/domain/index.js';
import { Registry } from '../src/application/registry.js';
import type { RegistryOptions } from '../src/application/registry.js';
import { MemoryKeyValueStore } from '../src/infrastructure/kv/index.js';

let counter = 0;

/** Logger that discards everything; spy on its methods to assert. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function memoryRegistry(options: Partial<RegistryOptions> = {}): Registry {
  return new Registry(new MemoryKeyValueStore(), options, silentLogger());
}

/**
 * Blockchain event factory with a fresh id per call.
 */
export function chainEvent(
  payload: Record<string, unknown>,
  overrides: { id?: string; source?: SourceKind; event_type?: BlockchainEventType; triggered_time?: number } = {},
): Event {
  counter++;
  return createEvent({
    trigger: 'blockchain',
    source: overrides.source ?? 'neo',
    event_type: overrides.event_type ?? 'block',
    triggered_time: overrides.triggered_time ?? 1_767_225_600,
    id: overrides.id ?? `test-${counter}`,
    payload,
  });
}

export function functionInput(trigger: TriggerConfig, overrides: Partial<FunctionInput> = {}): FunctionInput {
  return {
    name: overrides.name ?? 'test-function',
    description: overrides.description ?? '',
    trigger,
    permissions: overrides.permissions,
    resources: overrides.resources ?? DEFAULT_RESOURCES,
    code: overrides.code ?? 'function handler(event) { return event.data.id; }',
  };
}

/** Blockchain trigger on any source and event type. */
export function blockTrigger(filter?: Extract<TriggerConfig, { type: 'blockchain' }>['config']['filter']): SingleTrigger {
  return filter === undefined
    ? { type: 'blockchain', config: { source: '*', event_type: '*' } }
    : { type: 'blockchain', config: { source: '*', event_type: '*', filter } };
}
