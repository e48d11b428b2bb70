import { BatchCorrelationError } from "../errors/batch.js";
import type {
  BatchCall,
  BatchCallError,
  BatchResults,
  BatchRoundtrip,
  BatchValues,
  IdStore,
  JsonRpcRequest,
  JsonRpcResponse,
  Result,
  ValidateBatch,
} from "../types/index.js";
import { createRequest, parseBatchResponse, responseResult } from "./envelope.js";
import { idHandler } from "./id.js";

export type BatchOptions = {
  /** The id store to allocate the request ids from. */
  ids?: IdStore | undefined;
};

/**
 * Pairs every call of a batch with its response.
 *
 * A batch response carries no ordering guarantee, so responses are matched
 * by id: the counts must agree, every response needs an id, and the sorted
 * response ids must equal the sorted request ids. Anything else means the
 * node did not honour the batch and fails with {@link BatchCorrelationError}.
 *
 * The pairs come back in the order of `calls`.
 */
export function correlateResponses<call extends { readonly request: JsonRpcRequest }>(
  calls: readonly call[],
  responses: readonly JsonRpcResponse[],
): (readonly [call, JsonRpcResponse])[] {
  const expected = calls.map(({ request }) => request.id).sort((a, b) => a - b);
  const received = responses.map(({ id }) => id);
  const mismatch = () => new BatchCorrelationError({ expected, received });

  if (expected.length !== received.length) throw mismatch();

  const byId = new Map<number, JsonRpcResponse>();
  for (const response of responses) {
    if (response.id == null) throw mismatch();
    byId.set(response.id, response);
  }

  const sorted = [...byId.keys()].sort((a, b) => a - b);
  if (sorted.length !== expected.length || sorted.some((id, i) => id !== expected[i])) {
    throw mismatch();
  }

  return calls.map((call) => {
    const response = byId.get(call.request.id);
    if (!response) throw mismatch();
    return [call, response] as const;
  });
}

async function executeBatch(
  calls: readonly BatchCall[],
  roundtrip: BatchRoundtrip,
  ids: IdStore,
): Promise<Result<unknown, BatchCallError>[]> {
  if (calls.length === 0) return [];

  const pending = calls.map(([method, params]) => ({
    method,
    request: createRequest(method, params, ids),
  }));

  const body = await roundtrip(pending.map(({ request }) => request));
  const responses = parseBatchResponse(body);

  return correlateResponses(pending, responses).map(([{ method }, response]) =>
    responseResult(method, response),
  );
}

/**
 * Executes a batch of JSON-RPC calls with the provided round trip.
 *
 * Returns one outcome per call, in submission order, so that each call's
 * protocol or codec error can be handled on its own. Transport failures and
 * {@link BatchCorrelationError}s concern the whole batch and are thrown.
 *
 * @example
 * const [blockNumber, block] = await tryBatch(
 *   [
 *     [eth.blockNumber, []],
 *     [eth.getBlockByNumber, ["latest", false]],
 *   ],
 *   (requests) => transport.request(requests),
 * );
 */
export async function tryBatch<const calls extends readonly BatchCall[]>(
  calls: calls & ValidateBatch<calls>,
  roundtrip: BatchRoundtrip,
  options: BatchOptions = {},
): Promise<BatchResults<calls>> {
  const { ids = idHandler } = options;
  const results = await executeBatch(calls, roundtrip, ids);
  return results as BatchResults<calls>;
}

/**
 * Executes a batch of JSON-RPC calls with the provided round trip, throwing
 * the first per-call error in submission order.
 */
export async function batch<const calls extends readonly BatchCall[]>(
  calls: calls & ValidateBatch<calls>,
  roundtrip: BatchRoundtrip,
  options: BatchOptions = {},
): Promise<BatchValues<calls>> {
  const { ids = idHandler } = options;
  const results = await executeBatch(calls, roundtrip, ids);
  const values = results.map((result) => {
    if (result.error !== undefined) throw result.error;
    return result.data;
  });
  return values as BatchValues<calls>;
}
