export { rpcClient } from "./rpcClient.js";
