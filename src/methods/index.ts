export * as codecs from "./codecs.js";
export type { Block, BlockId, BlockSpec, TransactionCall } from "./codecs.js";
export { defineMethod, rawMethod, type DefineMethodParameters } from "./defineMethod.js";
export * as eth from "./eth.js";
export * as net from "./net.js";
export * as web3 from "./web3.js";
