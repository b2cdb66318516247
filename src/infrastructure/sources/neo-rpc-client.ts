import { z } from 'zod';

/**
 * Minimal Neo N3 JSON-RPC client: the three calls the block poller needs.
 */

export interface JsonRpcRequest {
  readonly jsonrpc: '2.0';
  readonly id: number;
  readonly method: string;
  readonly params: readonly unknown[];
}

/** Sends one request and resolves with the decoded response body. */
export type JsonRpcTransport = (request: JsonRpcRequest, signal?: AbortSignal) => Promise<unknown>;

export class JsonRpcError extends Error {
  constructor(
    readonly method: string,
    readonly rpcCode: number | undefined,
    message: string,
  ) {
    super(`${method}: ${message}`);
    this.name = 'JsonRpcError';
  }
}

const envelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

const signerSchema = z.object({
  account: z.string(),
  scopes: z.string(),
}).passthrough();

export const neoTransactionSchema = z.object({
  hash: z.string(),
  size: z.number().int().optional(),
  version: z.number().int().optional(),
  nonce: z.number().int().optional(),
  sender: z.string().optional(),
  sysfee: z.string().optional(),
  netfee: z.string().optional(),
  validuntilblock: z.number().int().optional(),
  script: z.string().optional(),
  signers: z.array(signerSchema).optional(),
});

export const neoBlockSchema = z.object({
  hash: z.string(),
  index: z.number().int().nonnegative(),
  time: z.number().int(),
  size: z.number().int().optional(),
  version: z.number().int().optional(),
  previousblockhash: z.string().optional(),
  merkleroot: z.string().optional(),
  nonce: z.string().optional(),
  primary: z.number().int().optional(),
  nextconsensus: z.string().optional(),
  tx: z.array(neoTransactionSchema).default([]),
});

const stackItemSchema = z.object({ type: z.string() }).passthrough();

export const neoNotificationSchema = z.object({
  contract: z.string(),
  eventname: z.string(),
  state: z.unknown().optional(),
});

export const neoApplicationLogSchema = z.object({
  txid: z.string(),
  executions: z.array(z.object({
    trigger: z.string(),
    vmstate: z.string(),
    exception: z.string().nullable().optional(),
    gasconsumed: z.string().optional(),
    stack: z.array(stackItemSchema).optional(),
    notifications: z.array(neoNotificationSchema).default([]),
  })).default([]),
});

export type NeoTransaction = z.infer<typeof neoTransactionSchema>;
export type NeoBlock = z.infer<typeof neoBlockSchema>;
export type NeoNotification = z.infer<typeof neoNotificationSchema>;
export type NeoApplicationLog = z.infer<typeof neoApplicationLogSchema>;

/** Posts JSON-RPC requests to `url` with the global fetch. */
export function httpTransport(url: string): JsonRpcTransport {
  return async (request, signal) => {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      ...(signal !== undefined ? { signal } : {}),
    });
    if (!res.ok) throw new JsonRpcError(request.method, undefined, `HTTP ${res.status}`);
    const body: unknown = await res.json();
    return body;
  };
}

export class NeoRpcClient {
  private nextId = 1;

  constructor(private readonly transport: JsonRpcTransport) {}

  /** Number of blocks in the chain; the tip index is `count - 1`. */
  async getBlockCount(signal?: AbortSignal): Promise<number> {
    return z.number().int().nonnegative().parse(await this.call('getblockcount', [], signal));
  }

  async getBlock(index: number, signal?: AbortSignal): Promise<NeoBlock> {
    return neoBlockSchema.parse(await this.call('getblock', [index, 1], signal));
  }

  async getApplicationLog(txid: string, signal?: AbortSignal): Promise<NeoApplicationLog> {
    return neoApplicationLogSchema.parse(await this.call('getapplicationlog', [txid], signal));
  }

  private async call(method: string, params: readonly unknown[], signal?: AbortSignal): Promise<unknown> {
    const raw = await this.transport({ jsonrpc: '2.0', id: this.nextId++, method, params }, signal);
    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) throw new JsonRpcError(method, undefined, 'malformed response');
    if (envelope.data.error !== undefined) {
      throw new JsonRpcError(method, envelope.data.error.code, envelope.data.error.message);
    }
    if (envelope.data.result === undefined) throw new JsonRpcError(method, undefined, 'missing result');
    return envelope.data.result;
  }
}
