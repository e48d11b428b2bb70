export * from "./actions/index.js";
export * from "./clients/index.js";
export * from "./encoding/index.js";
export * from "./errors/index.js";
export * from "./http/index.js";
export * from "./jsonrpc/index.js";
export * from "./methods/index.js";
export * from "./transports/index.js";
export type * from "./types/index.js";
export * from "./utils/index.js";
