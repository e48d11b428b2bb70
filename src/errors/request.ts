import { serializeJson } from "../encoding/json.js";
import { BaseError } from "./base.js";

export type HttpRequestErrorType = HttpRequestError & {
  name: "HttpRequestError";
};

export class HttpRequestError extends BaseError {
  body?: unknown;
  headers?: Headers | undefined;
  status?: number | undefined;
  url: string;

  constructor({
    body,
    cause,
    details,
    headers,
    status,
    url,
  }: {
    body?: unknown;
    cause?: Error | undefined;
    details?: string | undefined;
    headers?: Headers | undefined;
    status?: number | undefined;
    url: string;
  }) {
    super("HTTP request failed.", {
      cause,
      details,
      metaMessages: [
        status && `Status: ${status}`,
        `URL: ${url}`,
        body !== undefined && `Request body: ${serializeJson(body)}`,
      ].filter((line): line is string => typeof line === "string"),
      name: "HttpRequestError",
    });
    this.body = body;
    this.headers = headers;
    this.status = status;
    this.url = url;
  }
}
