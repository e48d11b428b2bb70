import type { BlockTag, Hash } from "viem";
import type { BlockId } from "../methods/codecs.js";

export type BlockIdParameters =
  | { blockNumber?: bigint | undefined; blockTag?: undefined; blockHash?: undefined }
  | { blockNumber?: undefined; blockTag?: BlockTag | undefined; blockHash?: undefined }
  | { blockNumber?: undefined; blockTag?: undefined; blockHash?: Hash | undefined };

export function toBlockId({ blockNumber, blockTag, blockHash }: BlockIdParameters): BlockId {
  if (blockHash !== undefined) return { blockHash };
  if (blockNumber !== undefined) return blockNumber;
  return blockTag ?? "latest";
}
