import type { MaybePromise, Prettify } from "./utils.js";

export type HttpClientOptions = {
  /** Request configuration to pass to `fetch`. */
  fetchOptions?: Omit<RequestInit, "body"> | undefined;
  /** A callback to handle the request. */
  onRequest?:
    | ((
        request: Request,
        init: RequestInit,
      ) => MaybePromise<void | undefined | (RequestInit & { url?: string | undefined })>)
    | undefined;
  /** A callback to handle the response. */
  onResponse?: ((response: Response) => Promise<void> | void) | undefined;
  /** The timeout (in ms) for the request. */
  timeout?: number | undefined;
};

export type HttpRequestParameters<body = unknown> = Prettify<
  HttpClientOptions & {
    body: body;
  }
>;

export type HttpClient = {
  readonly request: (params: HttpRequestParameters<unknown>) => Promise<unknown>;
};
