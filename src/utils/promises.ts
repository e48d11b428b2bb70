export type WithTimeoutErrorType = Error;

export function withTimeout<data>(
  fn: ({ signal }: { signal: AbortController["signal"] | null }) => Promise<data>,
  {
    errorInstance = new Error("timed out"),
    timeout,
    signal,
  }: {
    // The error instance to throw when the timeout is reached.
    errorInstance?: Error | undefined;
    // The timeout (in ms).
    timeout: number;
    // Whether or not the timeout should use an abort signal.
    signal?: boolean | undefined;
  },
): Promise<data> {
  return new Promise((resolve, reject) => {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId =
      timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            if (signal) controller.abort();
            else reject(errorInstance);
          }, timeout)
        : undefined;

    void fn({ signal: signal ? controller.signal : null })
      .then(resolve, (err: unknown) => {
        if (timedOut) reject(errorInstance);
        else reject(err);
      })
      .finally(() => clearTimeout(timeoutId));
  });
}

export type PromiseWithResolvers<type> = {
  promise: Promise<type>;
  resolve: (value: type | PromiseLike<type>) => void;
  reject: (reason?: unknown) => void;
};

export function withResolvers<type>(): PromiseWithResolvers<type> {
  let resolve: PromiseWithResolvers<type>["resolve"] = () => undefined;
  let reject: PromiseWithResolvers<type>["reject"] = () => undefined;

  const promise = new Promise<type>((resolve_, reject_) => {
    resolve = resolve_;
    reject = reject_;
  });

  return { promise, resolve, reject };
}
