import type { JsonValue } from "./encoding.js";

/**
 * Static binding between a wire method name, a parameter shape and a result
 * shape. Hooks may throw; the engine reports those failures as
 * `JsonCodecError`.
 */
export type Method<params = unknown, result = unknown> = {
  /** The wire name. Fixed for the lifetime of the descriptor. */
  readonly name: string;
  encodeParams(params: params): JsonValue;
  decodeParams(value: JsonValue): params;
  encodeResult(result: result): JsonValue;
  decodeResult(value: JsonValue): result;
};

export type AnyMethod = Method<unknown, unknown>;

export type MethodParameters<method> = method extends Method<infer params, unknown>
  ? params
  : never;

export type MethodReturnType<method> = method extends Method<unknown, infer result>
  ? result
  : never;

/**
 * Two-way conversion between a typed value and its JSON representation.
 */
export type Codec<T> = {
  encode(value: T): JsonValue;
  decode(value: JsonValue): T;
};

export type CodecType<codec> = codec extends Codec<infer T> ? T : never;

/** Empty positional parameters. */
export type Empty = readonly [];
