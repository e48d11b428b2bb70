import { HttpRequestError } from "../errors/request.js";
import { TimeoutError } from "../errors/timeout.js";
import type { HttpClient, HttpClientOptions } from "../types/index.js";
import { withTimeout } from "../utils/promises.js";

/**
 * Creates a client that POSTs JSON bodies to `url` and returns the parsed
 * JSON reply. The body goes out exactly as given: request ids belong to the
 * caller.
 */
export function rpcClient(url: string, options: HttpClientOptions = {}): HttpClient {
  return {
    async request(params) {
      const {
        body,
        onRequest = options.onRequest,
        onResponse = options.onResponse,
        timeout = options.timeout ?? 10_000,
      } = params;

      const fetchOptions = {
        ...(options.fetchOptions ?? {}),
        ...(params.fetchOptions ?? {}),
      };

      const { headers, method, signal: signal_ } = fetchOptions;

      try {
        const response = await withTimeout(
          async ({ signal }) => {
            const init: RequestInit = {
              ...fetchOptions,
              body: JSON.stringify(body),
              headers: {
                "Content-Type": "application/json",
                ...headers,
              },
              method: method || "POST",
              signal: signal_ || (timeout > 0 ? signal : null),
            };
            const request = new Request(url, init);
            const args = (await onRequest?.(request, init)) ?? { ...init, url };
            return await fetch(args.url ?? url, args);
          },
          {
            errorInstance: new TimeoutError({ body, url }),
            timeout,
            signal: true,
          },
        );

        if (onResponse) await onResponse(response);

        let data: unknown;
        if (response.headers.get("Content-Type")?.startsWith("application/json")) {
          data = await response.json();
        } else {
          const text = await response.text();
          try {
            data = JSON.parse(text || "{}");
          } catch (err) {
            if (response.ok) throw err;
            data = { error: text };
          }
        }

        if (!response.ok) {
          const error =
            typeof data === "object" && data !== null && "error" in data ? data.error : undefined;
          throw new HttpRequestError({
            body,
            details: JSON.stringify(error) || response.statusText,
            headers: response.headers,
            status: response.status,
            url,
          });
        }

        return data;
      } catch (err) {
        if (err instanceof HttpRequestError) throw err;
        if (err instanceof TimeoutError) throw err;
        throw new HttpRequestError({
          body,
          cause: err instanceof Error ? err : undefined,
          details: err instanceof Error ? undefined : String(err),
          url,
        });
      }
    },
  };
}
