import { describe, expect, it, vi } from "vitest";
import { RpcError } from "../errors/rpc.js";
import { createResponse } from "../jsonrpc/envelope.js";
import { createIdStore } from "../jsonrpc/id.js";
import * as eth from "../methods/eth.js";
import * as web3 from "../methods/web3.js";
import { custom } from "../transports/custom.js";
import type { JsonRpcMessage, JsonRpcResponse } from "../types/index.js";
import { createClient } from "./createClient.js";

function answer(message: JsonRpcMessage): JsonRpcResponse {
  const id = "id" in message ? message.id : null;
  if (message.method === "web3_clientVersion") {
    return createResponse(web3.clientVersion, { data: "stub/v1.0.0" }, id);
  }
  if (message.method === "eth_blockNumber") {
    return createResponse(eth.blockNumber, { data: 100n }, id);
  }
  return { jsonrpc: "2.0", error: { code: -32601, message: "method not found", data: null }, id };
}

function createStubClient() {
  const request = vi.fn((body: JsonRpcMessage | JsonRpcMessage[]) =>
    Array.isArray(body) ? body.map(answer) : answer(body),
  );
  const client = createClient({ transport: custom({ request }), ids: createIdStore() });
  return { client, request };
}

describe("createClient", () => {
  it("exposes the transport configuration", () => {
    const { client } = createStubClient();
    expect(client.name).toBe("Client");
    expect(client.chain).toBeUndefined();
    expect(client.transport).toEqual({
      key: "custom",
      name: "Custom Provider",
      type: "custom",
      maxConcurrency: undefined,
    });
    expect(client.uid).toHaveLength(11);
  });

  it("sends each call in its own round trip", async () => {
    const { client, request } = createStubClient();
    await expect(client.call(web3.clientVersion, [])).resolves.toBe("stub/v1.0.0");
    await expect(client.call(eth.blockNumber, [])).resolves.toBe(100n);
    expect(request.mock.calls.map(([body]) => body)).toEqual([
      { jsonrpc: "2.0", method: "web3_clientVersion", params: [], id: 0 },
      { jsonrpc: "2.0", method: "eth_blockNumber", params: [], id: 1 },
    ]);
  });

  it("sends notifications without an id", async () => {
    const { client, request } = createStubClient();
    await client.notify(eth.blockNumber, []);
    expect(request).toHaveBeenCalledWith({
      jsonrpc: "2.0",
      method: "eth_blockNumber",
      params: [],
    });
  });

  it("runs batches through the same id store", async () => {
    const { client, request } = createStubClient();
    const [version, blockNumber] = await client.batch([
      [web3.clientVersion, []],
      [eth.blockNumber, []],
    ]);
    expect(version).toBe("stub/v1.0.0");
    expect(blockNumber).toBe(100n);

    const [chainId] = await client.tryBatch([[eth.chainId, []]]);
    expect(chainId.error).toBeInstanceOf(RpcError);
    expect(request.mock.calls[1]?.[0]).toEqual([
      { jsonrpc: "2.0", method: "eth_chainId", params: [], id: 2 },
    ]);
  });
});
