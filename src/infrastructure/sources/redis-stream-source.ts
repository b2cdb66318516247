import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Event, SourceAdapter, SourceKind } from '../../domain/index.js';
import { toEvent, wireEventSchema } from '../../application/event-schema.js';

export interface RedisStreamSourceOptions {
  readonly name: string;
  readonly kind: SourceKind;
  readonly stream: string;
  readonly group: string;
  readonly consumer: string;
  /** How long one XREADGROUP blocks waiting for entries. */
  readonly block_ms: number;
  /** Max entries per read. */
  readonly batch_size: number;
  /** Group start id on first creation; `$` skips existing history. */
  readonly start_id: string;
}

export const DEFAULT_REDIS_STREAM_OPTIONS: RedisStreamSourceOptions = {
  name: 'stream',
  kind: 'request',
  stream: 'chainfunc:events',
  group: 'chainfunc_engine',
  consumer: 'engine-1',
  block_ms: 5_000,
  batch_size: 100,
  start_id: '$',
};

// [[stream, [[id, fields | nil], ...]], ...] | nil
const readReplySchema = z
  .array(z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))]))
  .nullable();

type StreamEntry = readonly [id: string, fields: string[] | null];

/**
 * Reads canonical events that external producers append to a Redis stream.
 *
 * Each entry carries the wire JSON under its `event` field. An entry is
 * XACKed only once the consumer asks for the next event, i.e. after it has
 * been ingested; anything unacknowledged stays in this consumer's pending
 * list and is replayed first on the next `poll`.
 */
export class RedisStreamSource implements SourceAdapter {
  readonly name: string;
  readonly kind: SourceKind;
  private readonly options: RedisStreamSourceOptions;

  constructor(
    private readonly redis: Redis,
    private readonly log: Logger,
    options: Partial<RedisStreamSourceOptions> = {},
  ) {
    this.options = { ...DEFAULT_REDIS_STREAM_OPTIONS, ...options };
    this.name = this.options.name;
    this.kind = this.options.kind;
  }

  async *poll(signal: AbortSignal): AsyncGenerator<Event> {
    const { stream, group, consumer, batch_size, block_ms } = this.options;
    await this.ensureConsumerGroup();

    // Pending entries from an earlier run, oldest first
    let recovered = 0;
    let cursor = '0';
    while (!signal.aborted) {
      const entries = this.entriesOf(await this.redis.xreadgroup(
        'GROUP', group, consumer,
        'COUNT', batch_size,
        'STREAMS', stream,
        cursor,
      ));
      const last = entries[entries.length - 1];
      if (last === undefined) break;

      for (const entry of entries) {
        yield* this.deliver(entry);
        recovered++;
        if (signal.aborted) return;
      }
      cursor = last[0];
    }
    if (recovered > 0) this.log.info({ source: this.name, count: recovered }, 'Recovered pending entries');

    while (!signal.aborted) {
      const entries = this.entriesOf(await this.redis.xreadgroup(
        'GROUP', group, consumer,
        'COUNT', batch_size,
        'BLOCK', block_ms,
        'STREAMS', stream,
        '>',
      ));

      for (const entry of entries) {
        yield* this.deliver(entry);
        if (signal.aborted) return;
      }
    }
  }

  /** Drops the connection this source reads on. */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  /**
   * Creates the consumer group with MKSTREAM so the stream need not exist
   * yet. BUSYGROUP (group already exists) is not an error.
   */
  private async ensureConsumerGroup(): Promise<void> {
    const { stream, group, start_id } = this.options;
    try {
      await this.redis.xgroup('CREATE', stream, group, start_id, 'MKSTREAM');
      this.log.info({ group, stream }, 'Consumer group created');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.log.debug({ group }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }

  private entriesOf(reply: unknown): StreamEntry[] {
    const parsed = readReplySchema.parse(reply);
    if (parsed === null) return [];
    return parsed.flatMap(([, entries]) => entries);
  }

  private async *deliver([streamId, fields]: StreamEntry): AsyncGenerator<Event> {
    const { stream, group } = this.options;

    // Entry deleted from the stream while pending
    if (fields === null) {
      await this.redis.xack(stream, group, streamId);
      return;
    }

    const event = this.parseEntry(streamId, fields);
    if (event !== undefined) yield event;
    await this.redis.xack(stream, group, streamId);
  }

  /** Stream entries arrive as flat [field, value, field, value, ...] arrays. */
  private parseEntry(streamId: string, fields: readonly string[]): Event | undefined {
    const map = new Map<string, string>();
    for (let i = 0; i < fields.length; i += 2) {
      const key = fields[i];
      const value = fields[i + 1];
      if (key !== undefined && value !== undefined) map.set(key, value);
    }

    const raw = map.get('event');
    if (raw === undefined) {
      this.log.warn({ source: this.name, streamId }, 'Stream entry has no event field; skipped');
      return undefined;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err: unknown) {
      this.log.warn({ err, source: this.name, streamId }, 'Stream entry is not valid JSON; skipped');
      return undefined;
    }

    const result = wireEventSchema.safeParse(decoded);
    if (!result.success) {
      this.log.warn({ source: this.name, streamId, issues: result.error.issues }, 'Stream entry failed validation; skipped');
      return undefined;
    }
    // Entries without an event id are keyed by their stream id
    const input = result.data;
    return toEvent({ ...input, data: { ...input.data, id: input.data.id ?? streamId } });
  }
}
