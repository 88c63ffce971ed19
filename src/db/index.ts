import type Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle handle over a single better-sqlite3 connection. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/**
 * Anything statements can be issued against: a connection or an open
 * transaction. Helpers that must compose into a caller's transaction accept this.
 */
export type DrizzleExecutor = BaseSQLiteDatabase<"sync", Database.RunResult, Schema>;

/** Create a Drizzle database instance wrapping the given better-sqlite3 handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

export { schema };
export { ensureSchema } from "./bootstrap.js";
export { applyPlatformPragmas } from "./pragmas.js";
