// Export all repository interfaces

export type { EntityRepository } from "./entity-repository.js";
export type { LinkSynchronizer } from "./link-synchronizer.js";
