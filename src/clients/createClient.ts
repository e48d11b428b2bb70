import type { Chain } from "viem";
import { batch, tryBatch } from "../jsonrpc/batch.js";
import { call, notify } from "../jsonrpc/call.js";
import { createIdStore } from "../jsonrpc/id.js";
import type {
  BatchCall,
  Client,
  ClientConfig,
  Method,
  Transport,
  ValidateBatch,
} from "../types/index.js";
import { uid } from "../utils/uid.js";

/**
 * Creates a client that sends every call, notification and batch straight
 * through the transport, each in its own round trip.
 */
export function createClient<
  transport extends Transport = Transport,
  chain extends Chain | undefined = undefined,
>(parameters: ClientConfig<transport, chain>): Client<chain> {
  const { chain, name = "Client", ids = createIdStore() } = parameters;

  const { config: transport, request } = parameters.transport({ chain });

  return {
    chain,
    name,
    transport,
    uid: uid(),
    request,
    call: <params, result>(method: Method<params, result>, params: NoInfer<params>) =>
      call(method, params, request, { ids }),
    notify: <params>(method: Method<params, unknown>, params: NoInfer<params>) =>
      notify(method, params, request),
    batch: <const calls extends readonly BatchCall[]>(calls: calls & ValidateBatch<calls>) =>
      batch<calls>(calls, request, { ids }),
    tryBatch: <const calls extends readonly BatchCall[]>(calls: calls & ValidateBatch<calls>) =>
      tryBatch<calls>(calls, request, { ids }),
  };
}
