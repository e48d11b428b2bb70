import type { IdStore, JsonRpcId } from "../types/index.js";

export const MAX_ID = 0xffff_ffff;

/**
 * Creates a monotonically increasing id counter. Ids are unsigned 32-bit
 * integers and wrap to `0` after {@link MAX_ID}.
 */
export function createIdStore(start: JsonRpcId = 0): IdStore {
  let current = start;
  return {
    get current() {
      return current;
    },
    take() {
      const id = current;
      current = current === MAX_ID ? 0 : current + 1;
      return id;
    },
  };
}

export const idHandler = /*#__PURE__*/ createIdStore();
