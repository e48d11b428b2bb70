import { describeErrorCode, fromErrorCode, toErrorCode } from "../jsonrpc/errorCode.js";
import type { ErrorCode, JsonRpcErrorObject, JsonValue } from "../types/index.js";
import { BaseError } from "./base.js";

export type RpcErrorType = RpcError & {
  name: "RpcError";
};

/**
 * A well-formed JSON-RPC error response from the node. The remote peer
 * rejected this one call; nothing about the transport failed.
 */
export class RpcError extends BaseError {
  readonly code: ErrorCode;
  readonly data: JsonValue;
  readonly method?: string | undefined;
  readonly rpcMessage: string;

  constructor({
    code,
    message,
    data = null,
    method,
  }: {
    code: ErrorCode | number;
    message: string;
    data?: JsonValue | undefined;
    method?: string | undefined;
  }) {
    const errorCode = typeof code === "number" ? toErrorCode(code) : code;
    super(`${describeErrorCode(errorCode)}: ${message}`, {
      metaMessages: [
        ...(method ? [`Method: ${method}`] : []),
        ...(data !== null ? [`Data: ${JSON.stringify(data)}`] : []),
      ],
      name: "RpcError",
    });
    this.code = errorCode;
    this.data = data;
    this.method = method;
    this.rpcMessage = message;
  }

  /** The integer error code as sent on the wire. */
  get rpcCode(): number {
    return fromErrorCode(this.code);
  }

  static fromObject(error: JsonRpcErrorObject, method?: string): RpcError {
    return new RpcError({ ...error, method });
  }

  toObject(): JsonRpcErrorObject {
    return { code: this.rpcCode, message: this.rpcMessage, data: this.data };
  }
}
