import type { JsonRpcMessage, MaybePromise, Transport } from "../types/index.js";
import { createTransport } from "./createTransport.js";

export type CustomTransportConfig = {
  /** The name of the transport. */
  name?: string;
  /** The key of the transport. */
  key?: string;
  /**
   * The maximum number of round trips in flight at once. Set it to `1` when
   * the provider cannot be reentered.
   */
  maxConcurrency?: number;
};

export type CustomProvider = {
  request(body: JsonRpcMessage | JsonRpcMessage[]): MaybePromise<unknown>;
};

export type CustomTransport = Transport<"custom">;

/**
 * Wraps a provider with its own round trip, such as an in-process node or a
 * wallet.
 */
export function custom(provider: CustomProvider, config: CustomTransportConfig = {}): CustomTransport {
  const { key = "custom", name = "Custom Provider", maxConcurrency } = config;
  return () =>
    createTransport({
      type: "custom",
      name,
      key,
      maxConcurrency,
      request: async (body) => await provider.request(body),
    });
}
