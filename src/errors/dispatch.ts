import { BaseError } from "./base.js";

export type DispatchErrorType = DispatchError & {
  name: "DispatchError";
};

type SharedCause = {
  readonly error: Error;
};

/**
 * A round trip failed for a whole chunk of coalesced calls. Every caller of
 * the chunk receives its own instance; all instances share one root cause.
 *
 * Instances are only ever multiplied through {@link DispatchError.duplicate}.
 */
export class DispatchError extends BaseError {
  readonly #shared: SharedCause;
  /** The number of calls the failed round trip carried, when known. */
  readonly size: number | undefined;

  private constructor(shared: SharedCause, size: number | undefined) {
    super("Failed to dispatch the JSON-RPC request.", {
      cause: shared.error,
      metaMessages: size !== undefined ? [`Chunk size: ${size}`] : undefined,
      name: "DispatchError",
    });
    this.#shared = shared;
    this.size = size;
  }

  /**
   * Wraps the root cause of a chunk failure. An existing `DispatchError` is
   * returned as is so a root cause never gets wrapped twice.
   */
  static from(err: unknown, size?: number): DispatchError {
    if (err instanceof DispatchError) return err;
    const error = err instanceof Error ? err : new Error(String(err));
    return new DispatchError({ error }, size);
  }

  /** The failure every duplicate refers to. */
  get root(): Error {
    return this.#shared.error;
  }

  /** Returns a new error for another recipient, sharing the same root cause. */
  duplicate(): DispatchError {
    return new DispatchError(this.#shared, this.size);
  }
}
