import superjson from "superjson";

/**
 * Serializes any value, including `bigint`, `Map`, `Set` and `Date`, for
 * diagnostics. Not a wire encoding: JSON-RPC payloads go through the method
 * codecs.
 */
export function serializeJson<T>(value: T): string {
  return superjson.stringify(value);
}

export function deserializeJson<T>(value: string): T {
  return superjson.parse<T>(value);
}
