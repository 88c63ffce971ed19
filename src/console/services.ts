import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { ensureSchema } from "../db/bootstrap.js";
import { createConnectionProvider, StorageAccessor } from "../db/storage-accessor.js";
import { DrizzleEntityRepository, DrizzleLinkSynchronizer, ReadCache } from "../infrastructure/persistence/index.js";
import { ConsoleService } from "./console-service.js";

export interface ConsoleWiringOptions {
  readCacheTtlMs: number;
  botOwner: string;
  now?: () => Date;
}

/**
 * Build the console over a storage accessor. The repository and the link
 * synchronizer share one read cache so writes through either invalidate it.
 */
export function createConsoleService(storage: StorageAccessor, options: ConsoleWiringOptions): ConsoleService {
  const cache = new ReadCache(options.readCacheTtlMs);
  return new ConsoleService({
    entities: new DrizzleEntityRepository(storage, cache),
    links: new DrizzleLinkSynchronizer(storage, cache),
    botOwner: options.botOwner,
    now: options.now,
  });
}

/**
 * Shared lazy-initialized console singletons.
 *
 * Nothing runs at import time; the store is opened and its schema ensured on first call.
 */

let _storage: StorageAccessor | null = null;
let _consoleService: ConsoleService | null = null;

export function getStorage(): StorageAccessor {
  if (!_storage) {
    const storage = new StorageAccessor(createConnectionProvider(config.database.path));
    storage.withTransaction("ensure schema", (tx) => ensureSchema(tx));
    logger.info(`Console store ready at ${config.database.path}`);
    _storage = storage;
  }
  return _storage;
}

export function getConsoleService(): ConsoleService {
  if (!_consoleService) {
    _consoleService = createConsoleService(getStorage(), {
      readCacheTtlMs: config.readCache.ttlMs,
      botOwner: config.botDefaults.owner,
    });
  }
  return _consoleService;
}

/** Release the store. Safe to call more than once. */
export function closeConsoleServices(): void {
  _storage?.close();
  _storage = null;
  _consoleService = null;
}
