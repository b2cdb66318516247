import { describe, it, expect } from 'vitest';
import type { Event } from '../../../src/domain/index.js';
import { JsonRpcError, NeoRpcClient } from '../../../src/infrastructure/sources/neo-rpc-client.js';
import type { JsonRpcRequest } from '../../../src/infrastructure/sources/neo-rpc-client.js';
import { NeoBlockSource } from '../../../src/infrastructure/sources/neo-source.js';

const TX = '0x' + 'aa'.repeat(32);

/** In-process node: three blocks, one transaction in block 1 with two notifications. */
function fakeNode(calls: string[] = []) {
  return async (request: JsonRpcRequest): Promise<unknown> => {
    calls.push(request.method);
    const reply = (result: unknown) => ({ jsonrpc: '2.0', id: request.id, result });

    switch (request.method) {
      case 'getblockcount':
        return reply(3);
      case 'getblock': {
        const index = request.params[0];
        if (typeof index !== 'number') throw new Error('bad index');
        return reply({
          hash: `0xblock${index}`,
          index,
          time: 1_767_225_600_000 + index * 15_000,
          tx: index === 1 ? [{ hash: TX, sysfee: '100', netfee: '50' }] : [],
        });
      }
      case 'getapplicationlog':
        return reply({
          txid: TX,
          executions: [{
            trigger: 'Application',
            vmstate: 'HALT',
            notifications: [
              { contract: '0xc1', eventname: 'Transfer', state: { type: 'Array', value: [] } },
              { contract: '0xc2', eventname: 'Mint' },
            ],
          }],
        });
      default:
        return { jsonrpc: '2.0', id: request.id, error: { code: -32601, message: 'Method not found' } };
    }
  };
}

async function collect(source: NeoBlockSource, limit = 100): Promise<Event[]> {
  const out: Event[] = [];
  for await (const event of source.poll(new AbortController().signal)) {
    out.push(event);
    if (out.length >= limit) break;
  }
  return out;
}

describe('NeoBlockSource', () => {
  it('emits block, transaction and notification events in chain order', async () => {
    const source = new NeoBlockSource(new NeoRpcClient(fakeNode()), {
      process_historical: true,
      min_index: 1,
      max_index: 2,
    });

    const events = await collect(source);

    expect(events.map((e) => e.data.id)).toEqual([
      'block:1',
      `tx:${TX}`,
      `notification:${TX}:0`,
      `notification:${TX}:1`,
      'block:2',
    ]);
    expect(events.map((e) => e.context.event_type)).toEqual([
      'block', 'transaction', 'notification', 'notification', 'block',
    ]);
    expect(events[0]?.context.triggered_time).toBe(1_767_225_615);
    expect(source.position).toBe(3);
  });

  it('adds application logs and skips the extra call when only blocks are wanted', async () => {
    const withLogs = await collect(new NeoBlockSource(new NeoRpcClient(fakeNode()), {
      process_historical: true,
      min_index: 1,
      max_index: 1,
      transactions: false,
      notifications: false,
      application_logs: true,
    }));
    expect(withLogs.map((e) => e.data.id)).toEqual(['block:1', `applog:${TX}`]);

    const calls: string[] = [];
    await collect(new NeoBlockSource(new NeoRpcClient(fakeNode(calls)), {
      process_historical: true,
      min_index: 1,
      max_index: 1,
      transactions: false,
      notifications: false,
    }));
    expect(calls).not.toContain('getapplicationlog');
  });

  it('starts at the chain tip unless processing history', async () => {
    const events = await collect(new NeoBlockSource(new NeoRpcClient(fakeNode()), { max_index: 2 }));
    expect(events.map((e) => e.data.id)).toEqual(['block:2']);
  });
});

describe('NeoRpcClient', () => {
  it('surfaces JSON-RPC errors with their code', async () => {
    const client = new NeoRpcClient(async (request) => ({
      jsonrpc: '2.0',
      id: request.id,
      error: { code: -100, message: 'Unknown block' },
    }));

    const err = await client.getBlock(9).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(JsonRpcError);
    expect(err instanceof JsonRpcError && err.rpcCode).toBe(-100);
    expect(err instanceof Error && err.message).toBe('getblock: Unknown block');
  });

  it('rejects a response without a result', async () => {
    const client = new NeoRpcClient(async () => ({ jsonrpc: '2.0', id: 1 }));
    await expect(client.getBlockCount()).rejects.toThrow('getblockcount: missing result');
  });
});
