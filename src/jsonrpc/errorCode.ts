import type { ErrorCode } from "../types/index.js";

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

const SERVER_ERROR_RANGE = [-32099, -32000] as const;
const RESERVED_RANGE = [-32768, -32000] as const;

function inRange(code: number, [min, max]: readonly [number, number]): boolean {
  return code >= min && code <= max;
}

/**
 * Maps an integer error code to its tag. Total: every integer maps to
 * exactly one tag, and {@link fromErrorCode} gives the integer back.
 */
export function toErrorCode(code: number): ErrorCode {
  switch (code) {
    case PARSE_ERROR:
      return { type: "ParseError" };
    case INVALID_REQUEST:
      return { type: "InvalidRequest" };
    case METHOD_NOT_FOUND:
      return { type: "MethodNotFound" };
    case INVALID_PARAMS:
      return { type: "InvalidParams" };
    case INTERNAL_ERROR:
      return { type: "InternalError" };
  }
  if (inRange(code, SERVER_ERROR_RANGE)) return { type: "ServerError", code };
  if (inRange(code, RESERVED_RANGE)) return { type: "Reserved", code };
  return { type: "Other", code };
}

export function fromErrorCode(code: ErrorCode): number {
  switch (code.type) {
    case "ParseError":
      return PARSE_ERROR;
    case "InvalidRequest":
      return INVALID_REQUEST;
    case "MethodNotFound":
      return METHOD_NOT_FOUND;
    case "InvalidParams":
      return INVALID_PARAMS;
    case "InternalError":
      return INTERNAL_ERROR;
    case "ServerError":
    case "Reserved":
    case "Other":
      return code.code;
  }
}

export function describeErrorCode(code: ErrorCode): string {
  switch (code.type) {
    case "ParseError":
      return "parse error";
    case "InvalidRequest":
      return "invalid request";
    case "MethodNotFound":
      return "method not found";
    case "InvalidParams":
      return "invalid params";
    case "InternalError":
      return "internal error";
    case "ServerError":
      return `server error (${code.code})`;
    case "Reserved":
      return `reserved (${code.code})`;
    case "Other":
      return `${code.code}`;
  }
}
