import { serializeJson } from "../encoding/json.js";
import { BaseError } from "./base.js";

export type TimeoutErrorType = TimeoutError & {
  name: "TimeoutError";
};

export class TimeoutError extends BaseError {
  constructor({
    body,
    url,
  }: {
    body: unknown;
    url: string;
  }) {
    super("The request took too long to respond.", {
      details: "The request timed out.",
      metaMessages: [`URL: ${url}`, `Request body: ${serializeJson(body)}`],
      name: "TimeoutError",
    });
  }
}
