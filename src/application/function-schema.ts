import { z } from 'zod';
import {
  BLOCKCHAIN_EVENT_TYPES,
  CronSyntaxError,
  DEFAULT_RESOURCES,
  FilterEvaluationError,
  SOURCE_KINDS,
  VALUE_OPERATORS,
  compileFilter,
  isValidTimezone,
  parseCron,
  triggersOf,
} from '../domain/index.js';
import type { Filter, JsonValue, TriggerConfig, ValidationIssue } from '../domain/index.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const fieldSchema = z.string().min(1).max(256);

/** Recursive filter definition; every variant may be gated by `apply_if`. */
export const filterSchema: z.ZodType<Filter, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({
      type: z.literal('value'),
      field: fieldSchema,
      operator: z.enum(VALUE_OPERATORS),
      value: jsonValueSchema,
      apply_if: filterSchema.optional(),
    }),
    z.object({
      type: z.literal('range'),
      field: fieldSchema,
      min: z.number().finite().optional(),
      max: z.number().finite().optional(),
      apply_if: filterSchema.optional(),
    }),
    z.object({
      type: z.literal('pattern'),
      field: fieldSchema,
      pattern: z.string().min(1).max(1024),
      apply_if: filterSchema.optional(),
    }),
    z.object({
      type: z.literal('compound'),
      operator: z.enum(['and', 'or']),
      conditions: z.array(filterSchema).min(1).max(64),
      apply_if: filterSchema.optional(),
    }),
    z.object({
      type: z.literal('script'),
      code: z.string().min(1).max(16_384),
      apply_if: filterSchema.optional(),
    }),
  ]),
);

const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

const singleTriggerSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('blockchain'),
    config: z.object({
      source: z.union([z.enum(SOURCE_KINDS), z.literal('*')]).default('*'),
      event_type: z.union([z.enum(BLOCKCHAIN_EVENT_TYPES), z.literal('*')]).default('*'),
      filter: z.union([filterSchema, z.array(filterSchema).max(64)]).optional(),
    }),
  }),
  z.object({
    type: z.literal('schedule'),
    config: z.object({
      cron: z.string().min(1).max(256),
      timezone: z.string().min(1).max(64).optional(),
    }),
  }),
  z.object({
    type: z.literal('request'),
    config: z.object({
      path: z.string().regex(/^\/[\w\-./]*$/, 'Must start with / and contain only path characters'),
      methods: z
        .array(z.string().transform((m) => m.toUpperCase()).pipe(z.enum(HTTP_METHODS)))
        .min(1)
        .default(['POST']),
      auth_required: z.boolean().default(false),
    }),
  }),
  z.object({
    type: z.literal('oracle'),
    config: z.object({
      type: z.string().min(1).max(128),
      config: z.record(jsonValueSchema).default({}),
    }),
  }),
]);

export const triggerSchema = z.union([
  singleTriggerSchema,
  z.object({
    type: z.literal('multi_event'),
    config: z.object({
      triggers: z.array(singleTriggerSchema).min(1).max(16),
    }),
  }),
]);

const permissionsSchema = z.object({
  network: z.object({
    allow_outbound: z.boolean().default(false),
    allowed_domains: z.array(z.string().min(1).max(253)).max(64).default([]),
  }).default({}),
  storage: z.object({
    allow_read: z.boolean().default(true),
    allow_write: z.boolean().default(true),
    namespace: z.string().min(1).max(128).regex(/^[\w\-.:]+$/),
  }),
  blockchain: z.object({
    allow_read: z.boolean().default(true),
    allow_write: z.boolean().default(false),
    allowed_contracts: z.array(z.string().min(1)).max(64).default([]),
  }).default({}),
});

const resourcesSchema = z.object({
  memory_mb: z.number().int().min(16).max(4096).default(DEFAULT_RESOURCES.memory_mb),
  cpu_ms: z.number().int().min(1).max(600_000).default(DEFAULT_RESOURCES.cpu_ms),
  execution_time_ms: z.number().int().min(10).max(600_000).default(DEFAULT_RESOURCES.execution_time_ms),
  storage_kb: z.number().int().min(0).max(1_048_576).default(DEFAULT_RESOURCES.storage_kb),
});

/**
 * Zod schema for function registration.
 *
 * - `permissions` is optional; the registry derives defaults scoped to the
 *   new function id.
 * - `resources` fields default individually.
 */
export const registerFunctionSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().max(2048).default(''),
  trigger: triggerSchema,
  permissions: permissionsSchema.optional(),
  resources: resourcesSchema.default({}),
  code: z.string().min(1).max(1_048_576),
});

/** Partial update; at least one field besides `expected_version`. */
export const patchFunctionSchema = z
  .object({
    name: z.string().min(1).max(255).optional(),
    description: z.string().max(2048).optional(),
    trigger: triggerSchema.optional(),
    permissions: permissionsSchema.optional(),
    resources: resourcesSchema.optional(),
    code: z.string().min(1).max(1_048_576).optional(),
    expected_version: z.number().int().min(1).optional(),
  })
  .refine(
    (body) => Object.entries(body).some(([key, value]) => key !== 'expected_version' && value !== undefined),
    { message: 'At least one field must be provided' },
  );

export type RegisterFunctionBody = z.infer<typeof registerFunctionSchema>;
export type PatchFunctionBody = z.infer<typeof patchFunctionSchema>;

/** Flattens zod issues into `{path, message}` pairs. */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Checks what the schema cannot: filters compile, cron expressions parse and
 * timezones exist. Returns an empty list when the trigger is usable.
 */
export function validateTrigger(trigger: TriggerConfig): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const multi = trigger.type === 'multi_event';

  for (const [index, single] of triggersOf(trigger).entries()) {
    const base = multi ? `trigger.config.triggers.${index}.config` : 'trigger.config';

    if (single.type === 'blockchain') {
      try {
        compileFilter(single.config.filter);
      } catch (err: unknown) {
        if (!(err instanceof FilterEvaluationError)) throw err;
        issues.push({ path: `${base}.filter`, message: err.message });
      }
    }

    if (single.type === 'schedule') {
      try {
        parseCron(single.config.cron);
      } catch (err: unknown) {
        if (!(err instanceof CronSyntaxError)) throw err;
        issues.push({ path: `${base}.cron`, message: err.message });
      }
      if (single.config.timezone !== undefined && !isValidTimezone(single.config.timezone)) {
        issues.push({ path: `${base}.timezone`, message: `Unknown timezone "${single.config.timezone}"` });
      }
    }
  }

  return issues;
}
