import { BaseError } from "./base.js";

export type ClientClosedErrorType = ClientClosedError & {
  name: "ClientClosedError";
};

/** A call was issued after `close()`. */
export class ClientClosedError extends BaseError {
  constructor() {
    super("The client is closed and does not accept new calls.", {
      name: "ClientClosedError",
    });
  }
}

export type WorkerStoppedErrorType = WorkerStoppedError & {
  name: "WorkerStoppedError";
};

/**
 * The background worker of a buffered client ended before resolving a call
 * it had accepted. This is a lifecycle bug in the client, never an outcome
 * of the remote call.
 */
export class WorkerStoppedError extends BaseError {
  constructor({ cause }: { cause?: Error | undefined } = {}) {
    super("Background worker unexpectedly stopped.", {
      cause,
      name: "WorkerStoppedError",
    });
  }
}
