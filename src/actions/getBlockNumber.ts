import * as eth from "../methods/eth.js";
import type { CallClient } from "../types/index.js";

export type GetBlockNumberReturnType = Promise<bigint>;

/**
 * Get the number of the most recent block.
 * @returns The block number.
 */
export async function getBlockNumber(client: CallClient): GetBlockNumberReturnType {
  return await client.call(eth.blockNumber, []);
}
