import type { JsonCodecError } from "../errors/codec.js";
import type { RpcError } from "../errors/rpc.js";
import type { AnyMethod, MethodParameters, MethodReturnType } from "./method.js";
import type { Result } from "./utils.js";

/** A single `[method, params]` entry of a batch. */
export type BatchCall<method extends AnyMethod = AnyMethod> = readonly [
  method: method,
  params: MethodParameters<method>,
];

/**
 * Checks every entry of a batch against its own method descriptor, keeping
 * the positional types of a tuple batch.
 */
export type ValidateBatch<calls extends readonly BatchCall[]> = {
  readonly [K in keyof calls]: calls[K] extends readonly [infer method extends AnyMethod, unknown]
    ? BatchCall<method>
    : never;
};

export type BatchCallError = RpcError | JsonCodecError;

/** Per-call outcomes of a batch, in submission order. */
export type BatchResults<calls extends readonly BatchCall[]> = {
  -readonly [K in keyof calls]: calls[K] extends readonly [infer method, unknown]
    ? Result<MethodReturnType<method>, BatchCallError>
    : never;
};

/** Values of a batch where every call succeeded, in submission order. */
export type BatchValues<calls extends readonly BatchCall[]> = {
  -readonly [K in keyof calls]: calls[K] extends readonly [infer method, unknown]
    ? MethodReturnType<method>
    : never;
};
