import { ZodError } from "zod";
import { JsonCodecError } from "../errors/codec.js";
import { RpcError } from "../errors/rpc.js";
import type {
  IdStore,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  Method,
  Result,
} from "../types/index.js";
import { idHandler } from "./id.js";
import { requestSchema, responseSchema } from "./schema.js";

/**
 * Runs a codec step, reporting any failure as a {@link JsonCodecError}.
 */
export function withCodec<T>(
  fn: () => T,
  { method, value }: { method?: string | undefined; value?: unknown },
): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof JsonCodecError) throw err;
    throw new JsonCodecError({
      cause: err instanceof Error ? err : undefined,
      details: err instanceof ZodError ? formatZodError(err) : undefined,
      method,
      value,
    });
  }
}

function formatZodError(err: ZodError): string {
  return err.issues
    .map(({ path, message }) => (path.length ? `${path.join(".")}: ${message}` : message))
    .join("; ");
}

/**
 * Builds a request for `method`, encoding `params` through the descriptor
 * and taking a fresh id from `ids`.
 */
export function createRequest<params>(
  method: Method<params, unknown>,
  params: NoInfer<params>,
  ids: IdStore = idHandler,
): JsonRpcRequest {
  const encoded = withCodec(() => method.encodeParams(params), {
    method: method.name,
    value: params,
  });
  return { jsonrpc: "2.0", method: method.name, params: encoded, id: ids.take() };
}

export function createNotification<params>(
  method: Method<params, unknown>,
  params: NoInfer<params>,
): JsonRpcNotification {
  const encoded = withCodec(() => method.encodeParams(params), {
    method: method.name,
    value: params,
  });
  return { jsonrpc: "2.0", method: method.name, params: encoded };
}

/**
 * Validates a request object received from the wire. Requests without an id
 * are notifications.
 */
export function parseRequest(value: unknown): JsonRpcRequest | JsonRpcNotification {
  const { jsonrpc, method, params = null, id } = withCodec(() => requestSchema.parse(value), {
    value,
  });
  return id === undefined ? { jsonrpc, method, params } : { jsonrpc, method, params, id };
}

/**
 * Validates a response envelope. When a node sends both `result` and `error`
 * (seen with auto-mining development nodes), `result` wins.
 */
export function parseResponse(value: unknown, method?: string): JsonRpcResponse {
  const { jsonrpc, result, error, id } = withCodec(() => responseSchema.parse(value), {
    method,
    value,
  });
  if (result !== undefined) return { jsonrpc, result, id };
  if (error !== undefined) return { jsonrpc, error: { ...error, data: error.data ?? null }, id };
  throw new JsonCodecError({ details: "missing 'result' or 'error' field", method, value });
}

/**
 * Validates a batch response: a JSON array of response envelopes.
 */
export function parseBatchResponse(value: unknown): JsonRpcResponse[] {
  if (!Array.isArray(value)) {
    throw new JsonCodecError({ details: "expected a JSON array of responses", value });
  }
  return value.map((response) => parseResponse(response));
}

/**
 * Decodes the outcome of a response for `method` without throwing on a
 * protocol error.
 */
export function responseResult<result>(
  method: Method<unknown, result>,
  response: JsonRpcResponse,
): Result<result, RpcError | JsonCodecError> {
  if (response.error !== undefined) {
    return { error: RpcError.fromObject(response.error, method.name) };
  }
  const { result } = response;
  try {
    const data = withCodec(() => method.decodeResult(result), {
      method: method.name,
      value: result,
    });
    return { data };
  } catch (err) {
    if (err instanceof JsonCodecError) return { error: err };
    throw err;
  }
}

/**
 * Decodes the result of a response for `method`, throwing the
 * {@link RpcError} of an error response.
 */
export function unwrapResponse<result>(
  method: Method<unknown, result>,
  response: JsonRpcResponse,
): result {
  const outcome = responseResult(method, response);
  if (outcome.error !== undefined) throw outcome.error;
  return outcome.data;
}

/**
 * Encodes the outcome of a call for `method` as a response envelope.
 */
export function createResponse<result>(
  method: Method<unknown, result>,
  outcome: Result<NoInfer<result>, RpcError>,
  id: JsonRpcId | null = null,
): JsonRpcResponse {
  if (outcome.error !== undefined) return { jsonrpc: "2.0", error: outcome.error.toObject(), id };
  const { data } = outcome;
  const result = withCodec(() => method.encodeResult(data), { method: method.name, value: data });
  return { jsonrpc: "2.0", result, id };
}
