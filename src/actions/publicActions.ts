import type { CallClient } from "../types/index.js";
import { type GetBalanceParameters, type GetBalanceReturnType, getBalance } from "./getBalance.js";
import { type GetBlockParameters, type GetBlockReturnType, getBlock } from "./getBlock.js";
import { type GetBlockNumberReturnType, getBlockNumber } from "./getBlockNumber.js";
import { type GetChainIdReturnType, getChainId } from "./getChainId.js";
import {
  type GetTransactionCountParameters,
  type GetTransactionCountReturnType,
  getTransactionCount,
} from "./getTransactionCount.js";

export type PublicActions = {
  getBalance: (args: GetBalanceParameters) => GetBalanceReturnType;
  getBlock: (args?: GetBlockParameters) => GetBlockReturnType;
  getBlockNumber: () => GetBlockNumberReturnType;
  getChainId: () => GetChainIdReturnType;
  getTransactionCount: (args: GetTransactionCountParameters) => GetTransactionCountReturnType;
};

export function publicActions(client: CallClient): PublicActions {
  return {
    getBalance: (args) => getBalance(client, args),
    getBlock: (args) => getBlock(client, args),
    getBlockNumber: () => getBlockNumber(client),
    getChainId: () => getChainId(client),
    getTransactionCount: (args) => getTransactionCount(client, args),
  };
}
