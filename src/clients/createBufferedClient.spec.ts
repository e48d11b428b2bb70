import { afterEach, describe, expect, it, vi } from "vitest";
import { BatchCorrelationError } from "../errors/batch.js";
import { ClientClosedError, WorkerStoppedError } from "../errors/client.js";
import { JsonCodecError } from "../errors/codec.js";
import { DispatchError } from "../errors/dispatch.js";
import { RpcError } from "../errors/rpc.js";
import { createResponse } from "../jsonrpc/envelope.js";
import { rawMethod } from "../methods/defineMethod.js";
import * as eth from "../methods/eth.js";
import { custom } from "../transports/custom.js";
import type { JsonRpcMessage, JsonRpcResponse } from "../types/index.js";
import { withResolvers } from "../utils/promises.js";
import { createBufferedClient } from "./createBufferedClient.js";

function answer(message: JsonRpcMessage): JsonRpcResponse {
  const id = "id" in message ? message.id : null;
  switch (message.method) {
    case "eth_blockNumber":
      return createResponse(eth.blockNumber, { data: 16n }, id);
    case "eth_chainId":
      return createResponse(eth.chainId, { data: 1n }, id);
    case "eth_gasPrice":
      return { jsonrpc: "2.0", result: "not a quantity", id };
    default:
      return {
        jsonrpc: "2.0",
        error: { code: -32601, message: "method not found", data: null },
        id,
      };
  }
}

/** An in-process node answering batches in reverse order. */
function createNode() {
  const bodies: (JsonRpcMessage | JsonRpcMessage[])[] = [];
  const transport = custom({
    request(body) {
      bodies.push(body);
      return Array.isArray(body) ? body.map(answer).reverse() : answer(body);
    },
  });
  return { bodies, transport };
}

/** A node that holds every round trip until it is released. */
function createGatedNode() {
  const bodies: (JsonRpcMessage | JsonRpcMessage[])[] = [];
  const gates: (() => void)[] = [];
  const provider = {
    request(body: JsonRpcMessage | JsonRpcMessage[]) {
      bodies.push(body);
      const { promise, resolve } = withResolvers<unknown>();
      gates.push(() => resolve(Array.isArray(body) ? body.map(answer) : answer(body)));
      return promise;
    },
  };
  return { bodies, gates, provider };
}

function sizes(bodies: readonly (JsonRpcMessage | JsonRpcMessage[])[]) {
  return bodies.map((body) => (Array.isArray(body) ? body.length : "single"));
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("createBufferedClient", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("coalesces concurrent calls into one batch", async () => {
    const { bodies, transport } = createNode();
    const client = createBufferedClient({ transport });

    const results = await Promise.all([
      client.call(eth.blockNumber, []),
      client.call(eth.chainId, []),
      client.call(eth.blockNumber, []),
      client.call(eth.chainId, []),
      client.call(eth.blockNumber, []),
    ]);

    expect(results).toEqual([16n, 1n, 16n, 1n, 16n]);
    expect(sizes(bodies)).toEqual([5]);
    await client.close();
  });

  it("sends a lone call as a single request", async () => {
    const { bodies, transport } = createNode();
    const client = createBufferedClient({ transport });

    await expect(client.call(eth.chainId, [])).resolves.toBe(1n);
    expect(bodies).toEqual([{ jsonrpc: "2.0", method: "eth_chainId", params: [], id: 0 }]);
    await client.close();
  });

  it("splits chunks at the maximum size", async () => {
    const { bodies, transport } = createNode();
    const client = createBufferedClient({ transport, batch: { maxSize: 2 } });

    const results = await Promise.all(
      Array.from({ length: 5 }, () => client.call(eth.blockNumber, [])),
    );

    expect(results).toEqual([16n, 16n, 16n, 16n, 16n]);
    expect(sizes(bodies)).toEqual([2, 2, "single"]);
    await client.close();
  });

  it("keeps protocol and codec errors with their own caller", async () => {
    const { transport } = createNode();
    const client = createBufferedClient({ transport });

    const [blockNumber, missing, gasPrice] = await Promise.allSettled([
      client.call(eth.blockNumber, []),
      client.call(rawMethod("eth_unknown"), []),
      client.call(eth.gasPrice, []),
    ]);

    expect(blockNumber).toEqual({ status: "fulfilled", value: 16n });
    expect(missing.status === "rejected" && missing.reason).toBeInstanceOf(RpcError);
    expect(gasPrice.status === "rejected" && gasPrice.reason).toBeInstanceOf(JsonCodecError);
    await client.close();
  });

  it("hands every caller of a failed chunk its own copy of the failure", async () => {
    const failure = new Error("node down");
    const client = createBufferedClient({
      transport: custom({
        request() {
          throw failure;
        },
      }),
    });

    const settled = await Promise.allSettled([
      client.call(eth.blockNumber, []),
      client.call(eth.chainId, []),
      client.call(eth.gasPrice, []),
    ]);
    const errors = settled.map((outcome) =>
      outcome.status === "rejected" ? outcome.reason : undefined,
    );

    for (const error of errors) {
      expect(error).toBeInstanceOf(DispatchError);
      expect(error).toMatchObject({ root: failure, size: 3 });
    }
    expect(new Set(errors).size).toBe(3);
    await client.close();
  });

  it("wraps a failed single request", async () => {
    const failure = new Error("connection refused");
    const client = createBufferedClient({
      transport: custom({
        request() {
          throw failure;
        },
      }),
    });

    const promise = client.call(eth.chainId, []);
    await expect(promise).rejects.toBeInstanceOf(DispatchError);
    await expect(promise).rejects.toMatchObject({ root: failure, size: 1 });
    await client.close();
  });

  it("treats a malformed batch reply as a chunk failure", async () => {
    const client = createBufferedClient({
      transport: custom({ request: () => ({ jsonrpc: "2.0", result: "0x1", id: 0 }) }),
    });

    const settled = await Promise.allSettled([
      client.call(eth.chainId, []),
      client.call(eth.chainId, []),
    ]);

    for (const outcome of settled) {
      expect(outcome.status).toBe("rejected");
      if (outcome.status === "rejected") {
        expect(outcome.reason).toBeInstanceOf(DispatchError);
        expect(outcome.reason.root).toBeInstanceOf(JsonCodecError);
      }
    }
    await client.close();
  });

  it("treats missing responses as a chunk failure", async () => {
    const client = createBufferedClient({
      transport: custom({
        request: (body) => (Array.isArray(body) ? body.slice(1).map(answer) : answer(body)),
      }),
    });

    const settled = await Promise.allSettled([
      client.call(eth.chainId, []),
      client.call(eth.blockNumber, []),
    ]);

    for (const outcome of settled) {
      expect(outcome.status).toBe("rejected");
      if (outcome.status === "rejected") {
        expect(outcome.reason.root).toBeInstanceOf(BatchCorrelationError);
      }
    }
    await client.close();
  });

  it("treats an omitted delay as a zero delay", async () => {
    async function drive(batch: { delay?: number }) {
      const { bodies, transport } = createNode();
      const client = createBufferedClient({ transport, batch });

      await Promise.all([
        client.call(eth.blockNumber, []),
        client.call(eth.chainId, []),
        client.call(eth.blockNumber, []),
      ]);
      await flush();
      await client.call(eth.chainId, []);
      await client.close();
      return sizes(bodies);
    }

    const omitted = await drive({});
    const zero = await drive({ delay: 0 });

    expect(omitted).toEqual([3, "single"]);
    expect(zero).toEqual(omitted);
  });

  it("keeps collecting until the delay after the first call elapses", async () => {
    vi.useFakeTimers();
    const { bodies, transport } = createNode();
    const client = createBufferedClient({ transport, batch: { delay: 50 } });

    const first = client.call(eth.blockNumber, []);
    await vi.advanceTimersByTimeAsync(20);
    const second = client.call(eth.chainId, []);
    await vi.advanceTimersByTimeAsync(29);
    expect(bodies).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await expect(Promise.all([first, second])).resolves.toEqual([16n, 1n]);
    expect(sizes(bodies)).toEqual([2]);

    const third = client.call(eth.chainId, []);
    await vi.advanceTimersByTimeAsync(50);
    await expect(third).resolves.toBe(1n);
    expect(sizes(bodies)).toEqual([2, "single"]);

    const closing = client.close();
    await vi.runAllTimersAsync();
    await closing;
  });

  it("clamps concurrency to the transport limit", async () => {
    const { bodies, gates, provider } = createGatedNode();
    const client = createBufferedClient({
      transport: custom(provider, { maxConcurrency: 1 }),
      batch: { maxSize: 1, maxConcurrentRequests: 4 },
    });

    const calls = Promise.all([
      client.call(eth.blockNumber, []),
      client.call(eth.blockNumber, []),
      client.call(eth.blockNumber, []),
    ]);

    await flush();
    expect(bodies).toHaveLength(1);

    gates[0]?.();
    await flush();
    expect(bodies).toHaveLength(2);

    gates[1]?.();
    await flush();
    gates[2]?.();

    await expect(calls).resolves.toEqual([16n, 16n, 16n]);
    await client.close();
  });

  it("bounds concurrency by maxConcurrentRequests", async () => {
    const { bodies, gates, provider } = createGatedNode();
    const client = createBufferedClient({
      transport: custom(provider),
      batch: { maxSize: 1, maxConcurrentRequests: 2 },
    });

    const calls = Promise.all(Array.from({ length: 3 }, () => client.call(eth.chainId, [])));

    await flush();
    expect(bodies).toHaveLength(2);

    gates[0]?.();
    await flush();
    expect(bodies).toHaveLength(3);

    gates[1]?.();
    gates[2]?.();
    await expect(calls).resolves.toEqual([1n, 1n, 1n]);
    await client.close();
  });

  it("dispatches without bound when no limit is set", async () => {
    const { bodies, gates, provider } = createGatedNode();
    const client = createBufferedClient({
      transport: custom(provider),
      batch: { maxSize: 1 },
    });

    const calls = Promise.all(Array.from({ length: 4 }, () => client.call(eth.chainId, [])));

    await flush();
    expect(bodies).toHaveLength(4);

    for (const gate of gates) gate();
    await expect(calls).resolves.toEqual([1n, 1n, 1n, 1n]);
    await client.close();
  });

  it("drains accepted calls on close and refuses new ones", async () => {
    const { bodies, gates, provider } = createGatedNode();
    const client = createBufferedClient({ transport: custom(provider) });

    const call = client.call(eth.blockNumber, []);
    let closed = false;
    const closing = client.close().then(() => {
      closed = true;
    });

    expect(client.closed).toBe(true);
    await expect(client.call(eth.chainId, [])).rejects.toBeInstanceOf(ClientClosedError);

    await flush();
    expect(bodies).toHaveLength(1);
    expect(closed).toBe(false);

    gates[0]?.();
    await expect(call).resolves.toBe(16n);
    await closing;
    expect(closed).toBe(true);
  });

  it("logs chunk dispatch when enabled", async () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const { transport } = createNode();
    const client = createBufferedClient({ transport, logs: true });

    await Promise.all([client.call(eth.blockNumber, []), client.call(eth.chainId, [])]);

    expect(debug).toHaveBeenCalledWith(
      "[Buffered Client] dispatching 2 call(s): eth_blockNumber#0, eth_chainId#1",
    );
    await client.close();
  });

  it("rejects outstanding calls when the worker stops", async () => {
    const fault = new Error("log sink broken");
    vi.spyOn(console, "debug").mockImplementation(() => {
      throw fault;
    });
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { transport } = createNode();
    const client = createBufferedClient({ transport, logs: true });

    const promise = client.call(eth.blockNumber, []);
    await expect(promise).rejects.toBeInstanceOf(WorkerStoppedError);
    await expect(promise).rejects.toMatchObject({ cause: fault });
    expect(error).toHaveBeenCalledWith("[Buffered Client] background worker stopped:", fault);

    await expect(client.call(eth.chainId, [])).rejects.toBeInstanceOf(WorkerStoppedError);
    await client.close();
  });

  it("rejects an invalid batch size", () => {
    const { transport } = createNode();
    expect(() => createBufferedClient({ transport, batch: { maxSize: 0 } })).toThrow(
      "Invalid batch size: 0",
    );
  });
});
