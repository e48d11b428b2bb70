export type { BlockIdParameters } from "./blockId.js";
export {
  type GetBalanceParameters,
  type GetBalanceReturnType,
  getBalance,
} from "./getBalance.js";
export { type GetBlockParameters, type GetBlockReturnType, getBlock } from "./getBlock.js";
export { type GetBlockNumberReturnType, getBlockNumber } from "./getBlockNumber.js";
export { type GetChainIdReturnType, getChainId } from "./getChainId.js";
export {
  type GetTransactionCountParameters,
  type GetTransactionCountReturnType,
  getTransactionCount,
} from "./getTransactionCount.js";
export { type PublicActions, publicActions } from "./publicActions.js";
