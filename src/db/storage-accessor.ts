import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { logger } from "../config/logger.js";
import { type ConsoleError, isConsoleError, toConsoleError } from "../domain/errors.js";
import { applyPlatformPragmas } from "./pragmas.js";
import { createDb, type DrizzleDb, type DrizzleExecutor } from "./index.js";

/** Hands out better-sqlite3 connections for the duration of one operation. */
export interface ConnectionProvider {
  acquire(): Database.Database;
  release(connection: Database.Database): void;
  /** Close anything the provider keeps open. */
  close(): void;
}

/** Opens a fresh connection per operation and closes it on release. */
export class FileConnectionProvider implements ConnectionProvider {
  constructor(private readonly path: string) {
    this.ensureDir();
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  acquire(): Database.Database {
    const sqlite = new Database(this.path);
    try {
      applyPlatformPragmas(sqlite);
    } catch (err) {
      sqlite.close();
      throw err;
    }
    return sqlite;
  }

  release(connection: Database.Database): void {
    connection.close();
  }

  close(): void {
    // nothing held between operations
  }
}

/**
 * Keeps a single connection for stores that only live as long as their
 * connection does (":memory:"). Release is a no-op.
 */
export class SharedConnectionProvider implements ConnectionProvider {
  private connection: Database.Database | null;

  constructor(connection: Database.Database) {
    applyPlatformPragmas(connection);
    this.connection = connection;
  }

  acquire(): Database.Database {
    if (!this.connection) {
      throw new Error("Shared connection is closed");
    }
    return this.connection;
  }

  release(_connection: Database.Database): void {}

  close(): void {
    this.connection?.close();
    this.connection = null;
  }
}

export function createConnectionProvider(path: string): ConnectionProvider {
  return path === ":memory:" ? new SharedConnectionProvider(new Database(":memory:")) : new FileConnectionProvider(path);
}

/**
 * Scopes every store operation to one connection (and optionally one
 * transaction). The connection is released on every exit path, and anything
 * the store throws leaves here as a ConsoleError.
 */
export class StorageAccessor {
  constructor(private readonly connections: ConnectionProvider) {}

  withConnection<T>(operation: string, fn: (db: DrizzleDb) => T): T {
    let sqlite: Database.Database;
    try {
      sqlite = this.connections.acquire();
    } catch (err) {
      throw this.fail(operation, err);
    }

    try {
      return fn(createDb(sqlite));
    } catch (err) {
      throw this.fail(operation, err);
    } finally {
      this.connections.release(sqlite);
    }
  }

  /** BEGIN … COMMIT around `fn`; a throw anywhere inside rolls the whole unit back. */
  withTransaction<T>(operation: string, fn: (tx: DrizzleExecutor) => T): T {
    return this.withConnection(operation, (db) => db.transaction((tx) => fn(tx)));
  }

  close(): void {
    this.connections.close();
  }

  private fail(operation: string, err: unknown): ConsoleError {
    if (isConsoleError(err)) return err;

    const mapped = toConsoleError(err);
    if (mapped.kind === "constraint_violation") {
      logger.warn(`Storage: ${operation} violated a constraint`, { error: mapped.message });
    } else {
      logger.error(`Storage: ${operation} failed`, {
        error: mapped.message,
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
    return mapped;
  }
}
