/**
 * Source of the worker thread that hosts one function invocation.
 *
 * Runs as CommonJS under `eval: true`. The function body is compiled in a
 * fresh `vm` context that sees only `console`, `storage` and, when the
 * network permission allows it, `fetch`. The event is parsed inside that
 * context so the handler never holds objects from the host realm.
 *
 * Console lines are posted as they happen so a terminated run keeps them;
 * the final message carries only the storage keys the run touched.
 */
export const WORKER_BOOTSTRAP = String.raw`
const { parentPort, workerData } = require('node:worker_threads');
const vm = require('node:vm');

const { code, eventJson, contextJson, storage, permissions, storageLimitBytes } = workerData;
const entries = new Map(Object.entries(storage));
const written = new Set();
const deleted = new Set();
let exceeded = false;

function storageBytes() {
  let total = 0;
  for (const [key, value] of entries) {
    total += Buffer.byteLength(key) + Buffer.byteLength(JSON.stringify(value));
  }
  return total;
}

function clone(value) {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}

const storageApi = {
  get(key) {
    if (!permissions.storage.allow_read) throw new Error('storage read not permitted');
    return clone(entries.get(String(key)));
  },
  set(key, value) {
    if (!permissions.storage.allow_write) throw new Error('storage write not permitted');
    const name = String(key);
    entries.set(name, value === undefined ? null : clone(value));
    written.add(name);
    deleted.delete(name);
    if (storageBytes() > storageLimitBytes) {
      exceeded = true;
      throw new Error('storage limit of ' + storageLimitBytes + ' bytes exceeded');
    }
  },
  delete(key) {
    if (!permissions.storage.allow_write) throw new Error('storage write not permitted');
    const name = String(key);
    written.delete(name);
    deleted.add(name);
    return entries.delete(name);
  },
  keys() {
    if (!permissions.storage.allow_read) throw new Error('storage read not permitted');
    return [...entries.keys()];
  },
};

function record(level) {
  return (...args) => {
    const line = '[' + level + '] ' + args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
    parentPort.postMessage({ type: 'log', line });
  };
}

const consoleApi = { log: record('log'), info: record('info'), warn: record('warn'), error: record('error') };

const globals = { console: consoleApi, storage: storageApi };

if (permissions.network.allow_outbound) {
  const allowed = permissions.network.allowed_domains;
  globals.fetch = async (input, init) => {
    const url = new URL(String(input));
    if (allowed.length > 0 && !allowed.includes(url.hostname)) {
      throw new Error('network access to ' + url.hostname + ' not permitted');
    }
    const res = await fetch(url, init);
    const body = await res.text();
    return {
      status: res.status,
      ok: res.ok,
      headers: Object.fromEntries(res.headers),
      text: async () => body,
      json: async () => JSON.parse(body),
    };
  };
}

const context = vm.createContext(globals, { codeGeneration: { strings: false, wasm: false } });

(async () => {
  const started = Date.now();
  try {
    vm.runInContext(code, context, { filename: 'function.js' });
    const handler = vm.runInContext('typeof handler === "function" ? handler : undefined', context);
    if (typeof handler !== 'function') {
      throw new Error('function code must define handler(event, context)');
    }
    const event = vm.runInContext('JSON.parse(' + JSON.stringify(eventJson) + ')', context);
    const ctx = vm.runInContext('JSON.parse(' + JSON.stringify(contextJson) + ')', context);
    const value = await handler(event, ctx);
    if (exceeded) throw new Error('storage limit of ' + storageLimitBytes + ' bytes exceeded');
    parentPort.postMessage({
      type: 'done',
      result: value === undefined ? null : JSON.parse(JSON.stringify(value)),
      changes: {
        set: Object.fromEntries([...written].map((name) => [name, entries.get(name)])),
        deleted: [...deleted],
      },
      duration_ms: Date.now() - started,
    });
  } catch (err) {
    parentPort.postMessage({
      type: 'failed',
      error: err && typeof err.message === 'string' ? err.message : String(err),
      resource: exceeded ? 'storage' : undefined,
      duration_ms: Date.now() - started,
    });
  }
})();
`;
