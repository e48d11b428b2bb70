import type { RequestFn, Transport, TransportConfig } from "../types/index.js";

/**
 * @description Creates a transport intended to be used with a client.
 */
export function createTransport<type extends string>({
  key,
  name,
  type,
  maxConcurrency,
  request,
}: TransportConfig<type> & { request: RequestFn }): ReturnType<Transport<type>> {
  return {
    config: {
      key,
      name,
      type,
      maxConcurrency,
    },
    request,
  };
}
