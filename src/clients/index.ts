export { createBufferedClient } from "./createBufferedClient.js";
export { createClient } from "./createClient.js";
export { createPublicClient, type PublicClient } from "./createPublicClient.js";
