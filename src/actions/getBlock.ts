import type { BlockTag, Hash } from "viem";
import { BlockNotFoundError } from "../errors/block.js";
import type { Block } from "../methods/codecs.js";
import * as eth from "../methods/eth.js";
import type { CallClient } from "../types/index.js";

export type GetBlockParameters = {
  /** Whether to return full transaction objects instead of hashes. */
  includeTransactions?: boolean | undefined;
} & (
  | { blockNumber?: bigint | undefined; blockTag?: undefined; blockHash?: undefined }
  | { blockNumber?: undefined; blockTag?: BlockTag | undefined; blockHash?: undefined }
  | { blockNumber?: undefined; blockTag?: undefined; blockHash?: Hash | undefined }
);

export type GetBlockReturnType = Promise<Block>;

/**
 * Get a block by number, tag or hash. Defaults to the `latest` block.
 * @throws {BlockNotFoundError} when the node does not know the block.
 */
export async function getBlock(
  client: CallClient,
  parameters: GetBlockParameters = {},
): GetBlockReturnType {
  const { includeTransactions = false, blockNumber, blockTag = "latest", blockHash } = parameters;

  const block =
    blockHash !== undefined
      ? await client.call(eth.getBlockByHash, [blockHash, includeTransactions])
      : await client.call(eth.getBlockByNumber, [blockNumber ?? blockTag, includeTransactions]);

  if (!block) throw new BlockNotFoundError({ blockHash, blockNumber });

  return block;
}
