import type { JsonRpcId } from "../types/index.js";
import { BaseError } from "./base.js";

export type BatchCorrelationErrorType = BatchCorrelationError & {
  name: "BatchCorrelationError";
};

/**
 * The batch response does not structurally match the batch request: the
 * count differs, an id is missing, or the ids are not the requested ones.
 */
export class BatchCorrelationError extends BaseError {
  expected: readonly JsonRpcId[];
  received: readonly (JsonRpcId | null | undefined)[];

  constructor({
    expected,
    received,
  }: {
    expected: readonly JsonRpcId[];
    received: readonly (JsonRpcId | null | undefined)[];
  }) {
    super("JSON-RPC batch responses do not match requests.", {
      metaMessages: [
        `Expected ids: [${expected.join(", ")}]`,
        `Received ids: [${received.map((id) => (id == null ? "none" : id)).join(", ")}]`,
      ],
      name: "BatchCorrelationError",
    });
    this.expected = expected;
    this.received = received;
  }
}
