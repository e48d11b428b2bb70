import {
  type Address,
  type BlockTag,
  type Hash,
  type Hex,
  getAddress,
  hexToBigInt,
  isAddress,
  isHex,
  numberToHex,
  size,
} from "viem";
import { z } from "zod";
import { jsonValueSchema } from "../jsonrpc/schema.js";
import type { Codec, CodecType, Empty, Json, JsonValue } from "../types/index.js";

/**
 * Builds a codec from a zod schema for decoding and a function for encoding.
 */
export function fromSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  encode: (value: T) => JsonValue,
): Codec<T> {
  return {
    encode,
    decode: (value) => schema.parse(value),
  };
}

const hexSchema = z
  .string()
  .refine((value): value is Hex => isHex(value, { strict: true }), "expected 0x-prefixed hex");

const quantitySchema = hexSchema
  .refine((value) => value.length > 2, "expected a hex quantity")
  .transform((value) => hexToBigInt(value));

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "expected an address")
  .transform((value) => getAddress(value));

const hashSchema = hexSchema.refine(
  (value): value is Hash => size(value) === 32,
  "expected a 32 byte hash",
);

const blockTags = ["latest", "earliest", "pending", "safe", "finalized"] as const;

const blockTagSchema = z.enum(blockTags);

export const json: Codec<JsonValue> = fromSchema(jsonValueSchema, (value) => value);

export const string: Codec<string> = fromSchema(z.string(), (value) => value);

export const boolean: Codec<boolean> = fromSchema(z.boolean(), (value) => value);

/** Positional parameters of a method that takes none. */
export const empty: Codec<Empty> = fromSchema(
  z.tuple([]).transform((): Empty => []),
  () => [],
);

/** Unsigned integer encoded as a compact `0x` hex string. */
export const quantity: Codec<bigint> = fromSchema(quantitySchema, (value) => numberToHex(value));

/** Unformatted byte data. */
export const data: Codec<Hex> = fromSchema(hexSchema, (value) => value);

/** Account address, decoded to its checksummed form. */
export const address: Codec<Address> = fromSchema(addressSchema, (value) => value);

export const hash: Codec<Hash> = fromSchema(hashSchema, (value) => value);

export const blockTag: Codec<BlockTag> = fromSchema(blockTagSchema, (value) => value);

export type BlockSpec = bigint | BlockTag;

/** A block number or a block tag. */
export const blockSpec: Codec<BlockSpec> = fromSchema(
  z.union([blockTagSchema, quantitySchema]),
  (value) => (typeof value === "bigint" ? numberToHex(value) : value),
);

export type BlockId = BlockSpec | { readonly blockHash: Hash };

/** A block number, a block tag or a block hash. */
export const blockId: Codec<BlockId> = fromSchema(
  z.union([
    blockTagSchema,
    hashSchema.transform((blockHash) => ({ blockHash })),
    quantitySchema,
  ]),
  (value) => {
    if (typeof value === "bigint") return numberToHex(value);
    if (typeof value === "string") return value;
    return value.blockHash;
  },
);

export function nullable<T>(codec: Codec<T>): Codec<T | null> {
  return {
    encode: (value) => (value === null ? null : codec.encode(value)),
    decode: (value) => (value === null ? null : codec.decode(value)),
  };
}

export type TupleType<codecs extends readonly Codec<unknown>[]> = {
  readonly [K in keyof codecs]: CodecType<codecs[K]>;
};

/** Positional parameters, one codec per position. */
export function tuple<const codecs extends readonly Codec<unknown>[]>(
  ...codecs: codecs
): Codec<TupleType<codecs>> {
  const list: readonly Codec<unknown>[] = codecs;
  return {
    encode: (values) => {
      const items: readonly unknown[] = values;
      return list.map((codec, i) => codec.encode(items[i]));
    },
    decode: (value) => {
      const items = z.array(jsonValueSchema).length(list.length).parse(value);
      return items.map((item, i) => list[i]?.decode(item)) as TupleType<codecs>;
    },
  };
}

export type TransactionCall = {
  from?: Address | undefined;
  to?: Address | undefined;
  gas?: bigint | undefined;
  gasPrice?: bigint | undefined;
  value?: bigint | undefined;
  input?: Hex | undefined;
};

function compact(object: { [key: string]: JsonValue | undefined }): Json {
  const result: Json = {};
  for (const [key, value] of Object.entries(object)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function optional<T>(value: T | undefined, encode: (value: T) => JsonValue) {
  return value === undefined ? undefined : encode(value);
}

/** The call object of `eth_call` and `eth_estimateGas`. */
export const transactionCall: Codec<TransactionCall> = fromSchema(
  z
    .object({
      from: addressSchema.optional(),
      to: addressSchema.optional(),
      gas: quantitySchema.optional(),
      gasPrice: quantitySchema.optional(),
      value: quantitySchema.optional(),
      input: hexSchema.optional(),
    })
    .strict(),
  (call) =>
    compact({
      from: call.from,
      to: call.to,
      gas: optional(call.gas, numberToHex),
      gasPrice: optional(call.gasPrice, numberToHex),
      value: optional(call.value, numberToHex),
      input: call.input,
    }),
);

/**
 * The header fields of a block and its transactions, either as hashes or as
 * raw JSON objects when the block was requested hydrated. Other fields of the
 * node's block object are dropped.
 */
export type Block = {
  number: bigint;
  hash: Hash;
  parentHash: Hash;
  timestamp: bigint;
  gasLimit: bigint;
  gasUsed: bigint;
  baseFeePerGas?: bigint | undefined;
  miner: Address;
  transactions: (Hash | Json)[];
};

export const block: Codec<Block> = fromSchema(
  z.object({
    number: quantitySchema,
    hash: hashSchema,
    parentHash: hashSchema,
    timestamp: quantitySchema,
    gasLimit: quantitySchema,
    gasUsed: quantitySchema,
    baseFeePerGas: quantitySchema.optional(),
    miner: addressSchema,
    transactions: z.array(z.union([hashSchema, z.record(jsonValueSchema)])),
  }),
  (block) =>
    compact({
      number: numberToHex(block.number),
      hash: block.hash,
      parentHash: block.parentHash,
      timestamp: numberToHex(block.timestamp),
      gasLimit: numberToHex(block.gasLimit),
      gasUsed: numberToHex(block.gasUsed),
      baseFeePerGas: optional(block.baseFeePerGas, numberToHex),
      miner: block.miner,
      transactions: block.transactions,
    }),
);
