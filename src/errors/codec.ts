import { serializeJson } from "../encoding/json.js";
import { BaseError } from "./base.js";

export type JsonCodecErrorType = JsonCodecError & {
  name: "JsonCodecError";
};

/**
 * A local failure to encode or decode a JSON value: malformed JSON, an
 * envelope that is not JSON-RPC 2.0, or a payload that does not match the
 * shape a method descriptor expects.
 */
export class JsonCodecError extends BaseError {
  value?: unknown;

  constructor({
    cause,
    details,
    method,
    value,
  }: {
    cause?: Error | undefined;
    details?: string | undefined;
    method?: string | undefined;
    value?: unknown;
  }) {
    super("Failed to encode or decode a JSON value.", {
      cause,
      details,
      metaMessages: [
        method && `Method: ${method}`,
        value !== undefined && `Value: ${serializeJson(value)}`,
      ].filter((line): line is string => typeof line === "string"),
      name: "JsonCodecError",
    });
    this.value = value;
  }
}
