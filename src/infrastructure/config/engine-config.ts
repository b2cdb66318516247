import { z } from 'zod';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

/**
 * Engine process settings, read from the environment.
 */
export const engineConfigSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REGISTRY_URL: z.string().min(1).default('memory:'),
  DATABASE_URL: z.string().url().optional(),
  EVENT_TTL_S: intFromEnv(86_400, 1),
  MAX_EVENTS: intFromEnv(1_000, 1),
  HARD_TTL_S: intFromEnv(7 * 86_400, 1),
  SWEEP_INTERVAL_MS: intFromEnv(60_000, 1_000),
  LEASE_TIMEOUT_MS: intFromEnv(60_000, 1_000),
  ACQUIRE_TIMEOUT_MS: intFromEnv(30_000, 0),
  SOURCES_CONFIG: z.string().min(1).optional(),
  /** Bearer token that marks invoke requests as authenticated. */
  INVOKE_API_KEY: z.string().min(8).optional(),
}).superRefine((config, ctx) => {
  if (config.HARD_TTL_S < config.EVENT_TTL_S) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['HARD_TTL_S'], message: 'must be >= EVENT_TTL_S' });
  }
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

/**
 * Worker process settings.
 */
export const workerConfigSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TASK_SOURCE_URL: z.string().url().default('http://localhost:3000'),
  WORKER_ID: z.string().min(1).optional(),
  WORKER_CONCURRENCY: intFromEnv(4, 1),
  STORAGE_URL: z.string().min(1).default('memory:'),
  ACQUIRE_TIMEOUT_MS: intFromEnv(30_000, 0),
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const result = schema.safeParse(cleaned);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return parseEnv(engineConfigSchema, env);
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  return parseEnv(workerConfigSchema, env);
}
