import type { Codec, JsonValue, Method } from "../types/index.js";
import { json } from "./codecs.js";

export type DefineMethodParameters<params, result> = {
  /** The wire name of the method. */
  name: string;
  params: Codec<params>;
  result: Codec<result>;
};

/**
 * Builds a method descriptor from a parameters codec and a result codec.
 *
 * @example
 * const blockNumber = defineMethod({
 *   name: "eth_blockNumber",
 *   params: empty,
 *   result: quantity,
 * });
 */
export function defineMethod<params, result>(
  parameters: DefineMethodParameters<params, result>,
): Method<params, result> {
  const { name, params, result } = parameters;
  return {
    name,
    encodeParams: (value) => params.encode(value),
    decodeParams: (value) => params.decode(value),
    encodeResult: (value) => result.encode(value),
    decodeResult: (value) => result.decode(value),
  };
}

/** A descriptor carrying untyped JSON both ways. */
export function rawMethod(name: string): Method<JsonValue, JsonValue> {
  return defineMethod({ name, params: json, result: json });
}
