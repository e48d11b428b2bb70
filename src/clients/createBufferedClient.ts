import type { Chain } from "viem";
import { ClientClosedError, WorkerStoppedError } from "../errors/client.js";
import { DispatchError } from "../errors/dispatch.js";
import { correlateResponses } from "../jsonrpc/batch.js";
import { call } from "../jsonrpc/call.js";
import { parseBatchResponse } from "../jsonrpc/envelope.js";
import { createIdStore } from "../jsonrpc/id.js";
import type {
  BufferedClient,
  BufferedClientConfig,
  JsonRpcRequest,
  Method,
  Transport,
} from "../types/index.js";
import { createLimiter } from "../utils/limiter.js";
import { withResolvers } from "../utils/promises.js";
import { AsyncQueue } from "../utils/queue.js";
import { uid } from "../utils/uid.js";

type PendingCall = {
  readonly request: JsonRpcRequest;
  resolve(body: unknown): void;
  reject(error: unknown): void;
};

/**
 * Creates a client that coalesces concurrent calls into batched round trips.
 *
 * Each `call` looks like a plain single call to its caller: it gets its own
 * result, its own protocol or codec error, or its own copy of a failure that
 * hit the whole round trip. A background worker collects queued calls into
 * chunks of at most `batch.maxSize`, waiting up to `batch.delay` ms after the
 * first one, and dispatches chunks concurrently up to the smaller of
 * `batch.maxConcurrentRequests` and the transport's own limit.
 *
 * @example
 * const client = createBufferedClient({ chain: mainnet, transport: http() });
 * const [blockNumber, gasPrice] = await Promise.all([
 *   client.call(eth.blockNumber, []),
 *   client.call(eth.gasPrice, []),
 * ]);
 * await client.close();
 */
export function createBufferedClient<
  transport extends Transport = Transport,
  chain extends Chain | undefined = undefined,
>(parameters: BufferedClientConfig<transport, chain>): BufferedClient<chain> {
  const {
    chain,
    name = "Buffered Client",
    ids = createIdStore(),
    batch: batchOptions = {},
    logs = false,
  } = parameters;
  const { maxSize = 20, delay = 0, maxConcurrentRequests } = batchOptions;

  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`Invalid batch size: ${maxSize}`);
  }

  const { config: transport, request } = parameters.transport({ chain });

  const limiter = createLimiter(
    Math.min(
      maxConcurrentRequests ?? Number.POSITIVE_INFINITY,
      transport.maxConcurrency ?? Number.POSITIVE_INFINITY,
    ),
  );

  const queue = new AsyncQueue<PendingCall>();
  const pending = new Set<PendingCall>();
  let fault: { cause: Error | undefined } | undefined;

  function enqueue(request: JsonRpcRequest): Promise<unknown> {
    if (fault) return Promise.reject(new WorkerStoppedError(fault));
    if (queue.closed) return Promise.reject(new ClientClosedError());

    const { promise, resolve, reject } = withResolvers<unknown>();
    const entry: PendingCall = {
      request,
      resolve(body) {
        pending.delete(entry);
        resolve(body);
      },
      reject(error) {
        pending.delete(entry);
        reject(error);
      },
    };
    pending.add(entry);
    queue.push(entry);
    return promise;
  }

  async function collect(first: PendingCall): Promise<PendingCall[]> {
    const chunk = [first];

    if (delay <= 0) {
      while (chunk.length < maxSize) {
        const next = queue.tryShift();
        if (!next) break;
        chunk.push(next);
      }
      return chunk;
    }

    const deadline = Date.now() + delay;
    while (chunk.length < maxSize) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      const next = await queue.nextWithin(remaining);
      if (next.type !== "item") break;
      chunk.push(next.item);
    }
    return chunk;
  }

  async function dispatch(chunk: PendingCall[]): Promise<void> {
    if (logs) {
      console.debug(
        `[${name}] dispatching ${chunk.length} call(s): ${chunk
          .map(({ request }) => `${request.method}#${request.id}`)
          .join(", ")}`,
      );
    }

    try {
      const [single] = chunk;
      if (single && chunk.length === 1) {
        single.resolve(await request(single.request));
        return;
      }

      const body = await request(chunk.map(({ request }) => request));
      const responses = parseBatchResponse(body);
      for (const [entry, response] of correlateResponses(chunk, responses)) {
        entry.resolve(response);
      }
    } catch (err) {
      const error = DispatchError.from(err, chunk.length);
      if (logs) console.debug(`[${name}] dispatch failed: ${error.root.message}`);
      for (const entry of chunk) entry.reject(error.duplicate());
    }
  }

  function stop(err: unknown) {
    if (fault) return;
    fault = { cause: err instanceof Error ? err : undefined };
    console.error(`[${name}] background worker stopped:`, err);
    queue.close();
    for (const entry of [...pending]) entry.reject(new WorkerStoppedError(fault));
  }

  async function run(): Promise<void> {
    const inflight = new Set<Promise<void>>();

    for (;;) {
      await limiter.acquire();
      const first = await queue.next();
      if (first.type !== "item") {
        limiter.release();
        break;
      }

      const chunk = await collect(first.item);
      const task = dispatch(chunk)
        .catch(stop)
        .finally(() => {
          limiter.release();
          inflight.delete(task);
        });
      inflight.add(task);
    }

    await Promise.all(inflight);
  }

  const worker = run().catch(stop);

  return {
    chain,
    name,
    transport,
    uid: uid(),
    call: <params, result>(method: Method<params, result>, params: NoInfer<params>) =>
      call(method, params, enqueue, { ids }),
    get closed() {
      return queue.closed;
    },
    async close() {
      queue.close();
      await worker;
    },
  };
}

