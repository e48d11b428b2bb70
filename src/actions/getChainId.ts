import * as eth from "../methods/eth.js";
import type { CallClient } from "../types/index.js";

export type GetChainIdReturnType = Promise<number>;

/**
 * Get the id of the chain the node is on.
 * @returns The chain id.
 */
export async function getChainId(client: CallClient): GetChainIdReturnType {
  const chainId = await client.call(eth.chainId, []);
  return Number(chainId);
}
