import type { IdStore, JsonRpcNotification, Method, Roundtrip } from "../types/index.js";
import { createNotification, createRequest, parseResponse, unwrapResponse } from "./envelope.js";
import { idHandler } from "./id.js";

export type CallOptions = {
  /** The id store to allocate the request id from. */
  ids?: IdStore | undefined;
};

/**
 * Executes a single JSON-RPC call with the provided round trip.
 *
 * Takes exactly one id. Codec, transport and protocol failures are thrown
 * as they are; nothing is retried.
 */
export async function call<params, result>(
  method: Method<params, result>,
  params: NoInfer<params>,
  roundtrip: Roundtrip,
  options: CallOptions = {},
): Promise<result> {
  const { ids = idHandler } = options;
  const request = createRequest(method, params, ids);
  const body = await roundtrip(request);
  const response = parseResponse(body, method.name);
  return unwrapResponse(method, response);
}

/**
 * Sends a notification. The node never answers one, so whatever the round
 * trip returns is ignored.
 */
export async function notify<params>(
  method: Method<params, unknown>,
  params: NoInfer<params>,
  roundtrip: (notification: JsonRpcNotification) => unknown,
): Promise<void> {
  await roundtrip(createNotification(method, params));
}
