export type {
  BatchCall,
  BatchCallError,
  BatchResults,
  BatchValues,
  ValidateBatch,
} from "./batch.js";

export type {
  BatchFn,
  BufferedBatchOptions,
  BufferedClient,
  BufferedClientConfig,
  CallClient,
  CallFn,
  Client,
  ClientConfig,
  NotifyFn,
  TryBatchFn,
} from "./client.js";

export type { Json, JsonValue } from "./encoding.js";

export type { HttpClient, HttpClientOptions, HttpRequestParameters } from "./http.js";

export type {
  AnyMethod,
  Codec,
  CodecType,
  Empty,
  Method,
  MethodParameters,
  MethodReturnType,
} from "./method.js";

export type {
  ErrorCode,
  ErrorCodeType,
  IdStore,
  JsonRpcErrorObject,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  JsonRpcVersion,
} from "./rpc.js";

export type {
  BatchRoundtrip,
  JsonRpcMessage,
  RequestFn,
  Roundtrip,
  Transport,
  TransportConfig,
} from "./transports.js";

export type {
  Failure,
  MaybePromise,
  Prettify,
  Result,
  Success,
} from "./utils.js";
