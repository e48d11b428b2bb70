import {
  address,
  block,
  blockId,
  blockSpec,
  boolean,
  data,
  empty,
  hash,
  nullable,
  quantity,
  transactionCall,
  tuple,
} from "./codecs.js";
import { defineMethod } from "./defineMethod.js";

export const chainId = defineMethod({ name: "eth_chainId", params: empty, result: quantity });

export const blockNumber = defineMethod({
  name: "eth_blockNumber",
  params: empty,
  result: quantity,
});

/** Current gas price in wei. */
export const gasPrice = defineMethod({ name: "eth_gasPrice", params: empty, result: quantity });

/** Balance in wei of an account at a given block. */
export const getBalance = defineMethod({
  name: "eth_getBalance",
  params: tuple(address, blockId),
  result: quantity,
});

export const getTransactionCount = defineMethod({
  name: "eth_getTransactionCount",
  params: tuple(address, blockId),
  result: quantity,
});

export const getCode = defineMethod({
  name: "eth_getCode",
  params: tuple(address, blockId),
  result: data,
});

/** Executes a message call without creating a transaction. */
export const call = defineMethod({
  name: "eth_call",
  params: tuple(transactionCall, blockId),
  result: data,
});

/**
 * The second parameter asks for full transaction objects instead of hashes.
 * Resolves to `null` for an unknown block.
 */
export const getBlockByNumber = defineMethod({
  name: "eth_getBlockByNumber",
  params: tuple(blockSpec, boolean),
  result: nullable(block),
});

export const getBlockByHash = defineMethod({
  name: "eth_getBlockByHash",
  params: tuple(hash, boolean),
  result: nullable(block),
});

export const getBlockTransactionCountByHash = defineMethod({
  name: "eth_getBlockTransactionCountByHash",
  params: tuple(hash),
  result: nullable(quantity),
});

/** Number of transactions in a block, or `null` for an unknown block. */
export const getBlockTransactionCountByNumber = defineMethod({
  name: "eth_getBlockTransactionCountByNumber",
  params: tuple(blockSpec),
  result: nullable(quantity),
});
