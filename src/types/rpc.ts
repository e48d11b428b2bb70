import type { JsonValue } from "./encoding.js";

/**
 * Request and response id. Always an unsigned 32-bit integer so that it is
 * exactly representable as a JSON number.
 */
export type JsonRpcId = number;

export type JsonRpcVersion = "2.0";

export type JsonRpcRequest = {
  readonly jsonrpc: JsonRpcVersion;
  readonly method: string;
  readonly params: JsonValue;
  readonly id: JsonRpcId;
};

export type JsonRpcNotification = {
  readonly jsonrpc: JsonRpcVersion;
  readonly method: string;
  readonly params: JsonValue;
};

export type JsonRpcErrorObject = {
  readonly code: number;
  readonly message: string;
  readonly data: JsonValue;
};

export type JsonRpcSuccessResponse = {
  readonly jsonrpc: JsonRpcVersion;
  readonly result: JsonValue;
  readonly error?: undefined;
  readonly id?: JsonRpcId | null | undefined;
};

export type JsonRpcErrorResponse = {
  readonly jsonrpc: JsonRpcVersion;
  readonly result?: undefined;
  readonly error: JsonRpcErrorObject;
  readonly id?: JsonRpcId | null | undefined;
};

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * Closed set of JSON-RPC error code tags. Codes without a dedicated tag keep
 * their integer value so that the mapping round-trips exactly.
 */
export type ErrorCode =
  | { readonly type: "ParseError" }
  | { readonly type: "InvalidRequest" }
  | { readonly type: "MethodNotFound" }
  | { readonly type: "InvalidParams" }
  | { readonly type: "InternalError" }
  | { readonly type: "ServerError"; readonly code: number }
  | { readonly type: "Reserved"; readonly code: number }
  | { readonly type: "Other"; readonly code: number };

export type ErrorCodeType = ErrorCode["type"];

export type IdStore = {
  /** The id the next call to `take` returns. */
  readonly current: JsonRpcId;
  /** Allocates the next id. */
  take(): JsonRpcId;
};
