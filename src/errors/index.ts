export { BaseError, type BaseErrorType } from "./base.js";
export { BlockNotFoundError, type BlockNotFoundErrorType } from "./block.js";
export { BatchCorrelationError, type BatchCorrelationErrorType } from "./batch.js";
export {
  ClientClosedError,
  type ClientClosedErrorType,
  WorkerStoppedError,
  type WorkerStoppedErrorType,
} from "./client.js";
export { JsonCodecError, type JsonCodecErrorType } from "./codec.js";
export { DispatchError, type DispatchErrorType } from "./dispatch.js";
export { HttpRequestError, type HttpRequestErrorType } from "./request.js";
export { RpcError, type RpcErrorType } from "./rpc.js";
export { TimeoutError, type TimeoutErrorType } from "./timeout.js";
export { UrlRequiredError, type UrlRequiredErrorType } from "./transports.js";
