import type { Logger } from 'pino';
import { createEvent } from '../../domain/index.js';
import type { BlockchainEventType, Event, SourceAdapter } from '../../domain/index.js';
import { sleep } from '../../application/sleep.js';
import { withRetry, DEFAULT_RETRY_POLICY } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { NeoApplicationLog, NeoBlock, NeoRpcClient, NeoTransaction } from './neo-rpc-client.js';

export interface NeoSourceOptions {
  readonly name: string;
  readonly poll_interval_ms: number;
  /** Start at `min_index` instead of the chain tip. */
  readonly process_historical: boolean;
  readonly min_index?: number | undefined;
  /** Last block to emit; the source completes after it. */
  readonly max_index?: number | undefined;
  /** Blocks fetched per polling round. */
  readonly batch_size: number;
  readonly transactions: boolean;
  readonly notifications: boolean;
  readonly application_logs: boolean;
  readonly retry: RetryPolicy;
}

export const DEFAULT_NEO_SOURCE_OPTIONS: NeoSourceOptions = {
  name: 'neo',
  poll_interval_ms: 15_000,
  process_historical: false,
  batch_size: 10,
  transactions: true,
  notifications: true,
  application_logs: false,
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * Polls a Neo N3 node block by block.
 *
 * For each block, in index order: the block event, then per transaction in
 * block order its transaction event, its notification events and its
 * application log event (each kind behind its option). The cursor only moves
 * forward, so no event id is emitted twice by one instance.
 */
export class NeoBlockSource implements SourceAdapter {
  readonly kind = 'neo' as const;
  readonly name: string;
  private readonly options: NeoSourceOptions;

  /** Next block index to fetch. */
  private cursor: number | undefined;
  /** Events of the current block not yet yielded. */
  private readonly buffer: Event[] = [];

  constructor(
    private readonly client: NeoRpcClient,
    options: Partial<NeoSourceOptions> = {},
    private readonly log?: Logger,
  ) {
    this.options = { ...DEFAULT_NEO_SOURCE_OPTIONS, ...options };
    this.name = this.options.name;
  }

  /** Index of the next block this source will fetch, once known. */
  get position(): number | undefined {
    return this.cursor;
  }

  async *poll(signal: AbortSignal): AsyncGenerator<Event> {
    const { max_index, poll_interval_ms } = this.options;

    while (!signal.aborted) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }

      const cursor = this.cursor ?? await this.initialCursor(signal);
      this.cursor = cursor;
      if (max_index !== undefined && cursor > max_index) return;

      const count = await this.rpc(() => this.client.getBlockCount(signal), signal);
      const tip = count - 1;
      if (cursor > tip) {
        await sleep(poll_interval_ms, signal);
        continue;
      }

      const last = Math.min(tip, cursor + Math.max(1, this.options.batch_size) - 1, max_index ?? tip);
      for (let index = cursor; index <= last && !signal.aborted; index++) {
        const events = await this.blockEvents(index, signal);
        this.cursor = index + 1;
        this.buffer.push(...events);
        this.log?.debug({ source: this.name, index, events: events.length }, 'Block processed');

        let event = this.buffer.shift();
        while (event !== undefined) {
          yield event;
          if (signal.aborted) return;
          event = this.buffer.shift();
        }
      }
    }
  }

  private async initialCursor(signal: AbortSignal): Promise<number> {
    const min = this.options.min_index ?? 0;
    if (this.options.process_historical) return min;

    const count = await this.rpc(() => this.client.getBlockCount(signal), signal);
    return Math.max(count - 1, min, 0);
  }

  private async blockEvents(index: number, signal: AbortSignal): Promise<Event[]> {
    const block = await this.rpc(() => this.client.getBlock(index, signal), signal);
    const time = Math.floor(block.time / 1000);
    const events: Event[] = [this.event('block', `block:${block.index}`, time, blockPayload(block))];

    const wantLog = this.options.notifications || this.options.application_logs;

    for (const [position, tx] of block.tx.entries()) {
      if (this.options.transactions) {
        events.push(this.event('transaction', `tx:${tx.hash}`, time, transactionPayload(tx, block, position)));
      }
      if (!wantLog) continue;

      const appLog = await this.rpc(() => this.client.getApplicationLog(tx.hash, signal), signal);

      if (this.options.notifications) {
        let n = 0;
        for (const execution of appLog.executions) {
          for (const notification of execution.notifications) {
            events.push(this.event('notification', `notification:${tx.hash}:${n}`, time, {
              tx_hash: tx.hash,
              block_index: block.index,
              position: n,
              contract: notification.contract,
              event_name: notification.eventname,
              state: notification.state,
            }));
            n++;
          }
        }
      }

      if (this.options.application_logs) {
        events.push(this.event('application_log', `applog:${tx.hash}`, time, applicationLogPayload(appLog, block)));
      }
    }

    return events;
  }

  private event(eventType: BlockchainEventType, id: string, time: number, payload: unknown): Event {
    return createEvent({
      trigger: 'blockchain',
      source: 'neo',
      event_type: eventType,
      id,
      triggered_time: time,
      payload,
    });
  }

  private rpc<T>(operation: () => Promise<T>, signal: AbortSignal): Promise<T> {
    return withRetry(this.name, operation, this.options.retry, signal);
  }
}

function blockPayload(block: NeoBlock): Record<string, unknown> {
  return {
    index: block.index,
    hash: block.hash,
    time: block.time,
    size: block.size,
    version: block.version,
    previous_hash: block.previousblockhash,
    merkle_root: block.merkleroot,
    primary: block.primary,
    next_consensus: block.nextconsensus,
    tx_count: block.tx.length,
    transactions: block.tx.map((tx) => tx.hash),
  };
}

function transactionPayload(tx: NeoTransaction, block: NeoBlock, position: number): Record<string, unknown> {
  return {
    hash: tx.hash,
    block_index: block.index,
    block_hash: block.hash,
    position,
    size: tx.size,
    version: tx.version,
    nonce: tx.nonce,
    sender: tx.sender,
    sysfee: tx.sysfee,
    netfee: tx.netfee,
    valid_until_block: tx.validuntilblock,
    script: tx.script,
    signers: tx.signers,
  };
}

function applicationLogPayload(appLog: NeoApplicationLog, block: NeoBlock): Record<string, unknown> {
  return {
    tx_hash: appLog.txid,
    block_index: block.index,
    executions: appLog.executions.map((execution) => ({
      trigger: execution.trigger,
      vmstate: execution.vmstate,
      exception: execution.exception ?? undefined,
      gas_consumed: execution.gasconsumed,
      stack: execution.stack,
      notification_count: execution.notifications.length,
    })),
  };
}
