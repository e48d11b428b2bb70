export { batch, correlateResponses, tryBatch, type BatchOptions } from "./batch.js";
export { call, notify, type CallOptions } from "./call.js";
export {
  createNotification,
  createRequest,
  createResponse,
  parseBatchResponse,
  parseRequest,
  parseResponse,
  responseResult,
  unwrapResponse,
} from "./envelope.js";
export {
  INTERNAL_ERROR,
  INVALID_PARAMS,
  INVALID_REQUEST,
  METHOD_NOT_FOUND,
  PARSE_ERROR,
  describeErrorCode,
  fromErrorCode,
  toErrorCode,
} from "./errorCode.js";
export { MAX_ID, createIdStore, idHandler } from "./id.js";
