// Export persistence implementations
export { DrizzleEntityRepository } from "./drizzle-entity-repository.js";
export { DrizzleLinkSynchronizer } from "./drizzle-link-synchronizer.js";
export { ReadCache } from "./read-cache.js";
