import type { Address } from "viem";
import * as eth from "../methods/eth.js";
import type { CallClient } from "../types/index.js";
import { type BlockIdParameters, toBlockId } from "./blockId.js";

export type GetTransactionCountParameters = BlockIdParameters & {
  address: Address;
};

export type GetTransactionCountReturnType = Promise<number>;

/**
 * Get the number of transactions an account has sent, which is its next nonce.
 */
export async function getTransactionCount(
  client: CallClient,
  parameters: GetTransactionCountParameters,
): GetTransactionCountReturnType {
  const { address, ...block } = parameters;
  const count = await client.call(eth.getTransactionCount, [address, toBlockId(block)]);
  return Number(count);
}
