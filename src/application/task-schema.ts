import { z } from 'zod';
import { EXECUTION_OUTCOMES, isJsonValue } from '../domain/index.js';
import type { Func, JsonValue, TaskAssignment } from '../domain/index.js';
import { toEvent, wireEventSchema } from './event-schema.js';

/**
 * Bodies of the task protocol, shared by the HTTP routes and the worker's
 * client.
 */

const uidSchema = z.string().min(1).max(255);

const jsonSchema = z.custom<JsonValue>(isJsonValue, { message: 'Must be JSON' });

export const acquireTaskRequestSchema = z.object({
  uid: uidSchema,
  fid_hint: z.string().min(1).optional(),
  /** Long-poll deadline; capped by the server. */
  timeout_ms: z.number().int().min(0).max(120_000).optional(),
});

export const ackRequestSchema = z.object({
  uid: uidSchema,
  outcome: z.enum(EXECUTION_OUTCOMES),
  duration_ms: z.number().min(0),
  error: z.string().max(65_536).optional(),
  result: jsonSchema.optional(),
  logs: z.array(z.string()).max(1_000).optional(),
});

export const releaseRequestSchema = z.object({
  uid: uidSchema,
});

export const acquireFuncRequestSchema = z.object({
  uid: uidSchema,
});

const assignmentSchema = z.object({
  task_id: z.string().min(1),
  uid: uidSchema,
  fid: z.string().min(1),
  version: z.number().int().min(0),
  event: wireEventSchema,
  attempt: z.number().int().min(1),
});

export const funcSchema = z.object({
  version: z.number().int().min(1),
  code: z.string(),
  resources: z.object({
    memory_mb: z.number().int().positive(),
    cpu_ms: z.number().int().positive(),
    execution_time_ms: z.number().int().positive(),
    storage_kb: z.number().int().min(0),
  }),
  permissions: z.object({
    network: z.object({ allow_outbound: z.boolean(), allowed_domains: z.array(z.string()) }),
    storage: z.object({ allow_read: z.boolean(), allow_write: z.boolean(), namespace: z.string().min(1) }),
    blockchain: z.object({ allow_read: z.boolean(), allow_write: z.boolean(), allowed_contracts: z.array(z.string()) }),
  }),
});

export type AcquireTaskRequest = z.infer<typeof acquireTaskRequestSchema>;
export type AckRequest = z.infer<typeof ackRequestSchema>;

export function parseAssignment(body: unknown): TaskAssignment {
  const a = assignmentSchema.parse(body);
  return {
    task_id: a.task_id,
    uid: a.uid,
    fid: a.fid,
    version: a.version,
    attempt: a.attempt,
    event: toEvent(a.event),
  };
}

export function parseFunc(body: unknown): Func {
  return funcSchema.parse(body);
}
