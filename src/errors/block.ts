import type { Hash } from "viem";
import { BaseError } from "./base.js";

export type BlockNotFoundErrorType = BlockNotFoundError & {
  name: "BlockNotFoundError";
};

export class BlockNotFoundError extends BaseError {
  constructor({
    blockHash,
    blockNumber,
  }: {
    blockHash?: Hash | undefined;
    blockNumber?: bigint | undefined;
  }) {
    const identifier = (() => {
      if (blockHash) return ` at hash "${blockHash}"`;
      if (blockNumber !== undefined) return ` at number "${blockNumber}"`;
      return "";
    })();
    super(`Block${identifier} could not be found.`, {
      name: "BlockNotFoundError",
    });
  }
}
