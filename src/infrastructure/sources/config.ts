import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SOURCE_KINDS } from '../../domain/index.js';

/**
 * Source adapter configuration, loaded from JSON.
 */

const retrySchema = z.object({
  max_attempts: z.number().int().min(1).max(100).default(5),
  initial_delay_ms: z.number().int().min(0).default(500),
  max_delay_ms: z.number().int().min(0).default(10_000),
});

const common = {
  enabled: z.boolean().default(true),
};

const neoSourceSchema = z.object({
  ...common,
  type: z.literal('neo'),
  name: z.string().min(1).default('neo'),
  rpc_url: z.string().url(),
  poll_interval_ms: z.number().int().min(100).default(15_000),
  process_historical: z.boolean().default(false),
  min_index: z.number().int().nonnegative().optional(),
  max_index: z.number().int().nonnegative().optional(),
  batch_size: z.number().int().min(1).max(1000).default(10),
  transactions: z.boolean().default(true),
  notifications: z.boolean().default(true),
  application_logs: z.boolean().default(false),
  retry: retrySchema.default({}),
});

const timerSourceSchema = z.object({
  ...common,
  type: z.literal('timer'),
  name: z.string().min(1).default('timer'),
  interval_ms: z.number().int().min(1_000).default(60_000),
});

const redisStreamSourceSchema = z.object({
  ...common,
  type: z.literal('redis_stream'),
  name: z.string().min(1).default('stream'),
  url: z.string().regex(/^rediss?:\/\//, 'Must be a redis:// or rediss:// URL'),
  kind: z.enum(SOURCE_KINDS).default('request'),
  stream: z.string().min(1).default('chainfunc:events'),
  group: z.string().min(1).default('chainfunc_engine'),
  consumer: z.string().min(1).default('engine-1'),
  block_ms: z.number().int().min(100).default(5_000),
  batch_size: z.number().int().min(1).max(1000).default(100),
  start_id: z.string().min(1).default('$'),
});

const mockSourceSchema = z.object({
  ...common,
  type: z.literal('mock'),
  name: z.string().min(1).default('mock'),
  count: z.number().int().min(0).default(12),
  interval_ms: z.number().int().min(0).default(1_000),
  start_index: z.number().int().nonnegative().default(1),
});

export const sourceConfigSchema = z.discriminatedUnion('type', [
  neoSourceSchema,
  timerSourceSchema,
  redisStreamSourceSchema,
  mockSourceSchema,
]);

export const sourcesConfigSchema = z
  .object({
    restart_delay_ms: z.number().int().min(0).default(5_000),
    sources: z.array(sourceConfigSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const [i, source] of config.sources.entries()) {
      if (seen.has(source.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sources', i, 'name'], message: `Duplicate source name "${source.name}"` });
      }
      seen.add(source.name);

      if (source.type === 'neo' && source.min_index !== undefined && source.max_index !== undefined
        && source.min_index > source.max_index) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sources', i, 'max_index'], message: 'max_index must be >= min_index' });
      }
      if (source.type === 'neo' && source.retry.initial_delay_ms > source.retry.max_delay_ms) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sources', i, 'retry'], message: 'initial_delay_ms must be <= max_delay_ms' });
      }
    }
  });

export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;

/** Used when no configuration file exists: a one-minute timer. */
export const DEFAULT_SOURCES_CONFIG: SourcesConfig = {
  restart_delay_ms: 5_000,
  sources: [{ type: 'timer', name: 'timer', enabled: true, interval_ms: 60_000 }],
};

export class SourcesConfigError extends Error {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid sources config ${path}: ${message}`, options);
    this.name = 'SourcesConfigError';
  }
}

/**
 * Loads source configuration from a JSON file.
 *
 * A missing file yields DEFAULT_SOURCES_CONFIG; a file that exists but does
 * not parse or validate is an error.
 */
export function loadSourcesConfig(configPath?: string): SourcesConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'sources.json');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_SOURCES_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    throw new SourcesConfigError(filePath, 'not valid JSON', { cause: err });
  }

  const result = sourcesConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SourcesConfigError(filePath, detail);
  }
  return result.data;
}
