import type { Chain } from "viem";
import type { JsonRpcNotification, JsonRpcRequest } from "./rpc.js";
import type { MaybePromise } from "./utils.js";

/**
 * One logical round trip: a request or a batch of requests goes out, the
 * parsed JSON reply comes back. Failures are thrown.
 */
export type RequestFn = (body: JsonRpcMessage | JsonRpcMessage[]) => Promise<unknown>;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification;

/** A round trip for a single request, sync or async. */
export type Roundtrip = (request: JsonRpcRequest) => MaybePromise<unknown>;

/** A round trip for a batch of requests, sync or async. */
export type BatchRoundtrip = (requests: JsonRpcRequest[]) => MaybePromise<unknown>;

export type TransportConfig<type extends string = string> = {
  /** The name of the transport. */
  name: string;
  /** The key of the transport. */
  key: string;
  /** The type of the transport. */
  type: type;
  /**
   * The maximum number of round trips the transport can have in flight at
   * once. `1` for transports that cannot be reentered. Unbounded when unset.
   */
  maxConcurrency?: number | undefined;
};

export type Transport<type extends string = string> = <chain extends Chain | undefined = Chain>(
  parameters?: { chain?: chain | undefined } | undefined,
) => {
  config: TransportConfig<type>;
  request: RequestFn;
};
