export { makeMockLogger } from "./logger.js";
export { deferred, type Deferred } from "./deferred.js";
