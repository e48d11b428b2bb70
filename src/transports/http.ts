import { UrlRequiredError } from "../errors/transports.js";
import { rpcClient } from "../http/rpcClient.js";
import type { HttpClientOptions, Transport } from "../types/index.js";
import { createTransport } from "./createTransport.js";

export type HttpTransportConfig = {
  /**
   * Request configuration to pass to `fetch`.
   * @link https://developer.mozilla.org/en-US/docs/Web/API/fetch
   */
  fetchOptions?: HttpClientOptions["fetchOptions"];
  /** A callback to handle the request before `fetch`. */
  onFetchRequest?: HttpClientOptions["onRequest"];
  /** A callback to handle the response from `fetch`. */
  onFetchResponse?: HttpClientOptions["onResponse"];
  /** The name of the transport. */
  name?: string;
  /** The key of the transport. */
  key?: string;
  /** The timeout (in ms) for the HTTP request. Default: 10_000 */
  timeout?: number;
  /** The maximum number of requests in flight at once. Unbounded when unset. */
  maxConcurrency?: number;
};

export type HttpTransport = Transport<"http">;

/**
 * Creates a HTTP transport that connects to a JSON-RPC API.
 * @param url The URL of the JSON-RPC API. Defaults to the chain's RPC URL.
 * @param config {HttpTransportConfig} The configuration of the transport.
 * @returns The HTTP transport.
 */
export function http(_url_?: string | undefined, config: HttpTransportConfig = {}): HttpTransport {
  const {
    key = "http",
    name = "HTTP JSON-RPC",
    timeout = 10_000,
    maxConcurrency,
    fetchOptions,
    onFetchRequest,
    onFetchResponse,
  } = config;
  return ({ chain } = {}) => {
    const url = _url_ || chain?.rpcUrls.default.http[0];
    if (!url) throw new UrlRequiredError();

    const client = rpcClient(url, {
      fetchOptions,
      onRequest: onFetchRequest,
      onResponse: onFetchResponse,
      timeout,
    });

    return createTransport({
      type: "http",
      name,
      key,
      maxConcurrency,
      request: (body) => client.request({ body }),
    });
  };
}
