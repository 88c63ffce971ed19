import type Database from "better-sqlite3";

/**
 * Apply standard pragmas to a SQLite database handle.
 *
 * - foreign_keys = ON: SQLite leaves FK enforcement off per connection unless
 *   asked, and BotKnowledgeLink relies on it
 * - journal_mode = WAL: concurrent readers with a single writer (file stores only)
 * - busy_timeout = 5000: wait up to 5 seconds for write locks instead of
 *   failing immediately with SQLITE_BUSY
 */
export function applyPlatformPragmas(sqlite: Database.Database): void {
  sqlite.pragma("foreign_keys = ON");
  if (!sqlite.memory) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("busy_timeout = 5000");
}
