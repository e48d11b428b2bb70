import type { Address } from "viem";
import * as eth from "../methods/eth.js";
import type { CallClient } from "../types/index.js";
import { type BlockIdParameters, toBlockId } from "./blockId.js";

export type GetBalanceParameters = BlockIdParameters & {
  address: Address;
};

export type GetBalanceReturnType = Promise<bigint>;

/**
 * Get the balance of an account.
 * @param parameters
 * @param parameters.address The address to get the balance of.
 * @param parameters.blockNumber The block at which to query the balance.
 * @param parameters.blockTag The block tag at which to query the balance. Default: `latest`
 * @param parameters.blockHash The hash of the block at which to query the balance.
 * @returns The balance of the account, in wei.
 */
export async function getBalance(
  client: CallClient,
  parameters: GetBalanceParameters,
): GetBalanceReturnType {
  const { address, ...block } = parameters;
  return await client.call(eth.getBalance, [address, toBlockId(block)]);
}
