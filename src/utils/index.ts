export { createLimiter, type Limiter } from "./limiter.js";
export { withResolvers, withTimeout, type PromiseWithResolvers } from "./promises.js";
export { AsyncQueue, type QueueResult } from "./queue.js";
export { uid } from "./uid.js";
