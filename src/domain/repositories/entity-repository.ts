/**
 * Repository Interface: EntityRepository (ASYNC)
 *
 * Row-level access to the three console tables. Implementations can be sync
 * underneath (better-sqlite3) but expose an async API.
 */

import type { CellValue, ColumnName, TableInsert, TableName, TableRow } from "../tables.js";

export interface EntityRepository {
  /** Full contents of a table. May be served from the read cache. */
  readAll<T extends TableName>(table: T): Promise<TableRow<T>[]>;

  /**
   * Append one row and return its key (the rowid for tables without a single
   * integer key). Throws ConstraintViolation on uniqueness or FK failures.
   */
  insert<T extends TableName>(table: T, row: TableInsert<T>): Promise<number>;

  /**
   * Update the listed columns on every row whose key column equals keyValue.
   * Empty strings are stored as null. Returns the number of rows changed (0 is not an error).
   */
  updateByKey<T extends TableName>(
    table: T,
    keyColumn: ColumnName<T>,
    keyValue: CellValue,
    values: Partial<Record<ColumnName<T>, CellValue>>,
  ): Promise<number>;

  /**
   * Delete every row whose key column equals keyValue. Bots and KnowledgeBase
   * rows take their links with them in the same transaction.
   * Returns the number of rows deleted from `table`.
   */
  deleteByKey<T extends TableName>(table: T, keyColumn: ColumnName<T>, keyValue: CellValue): Promise<number>;
}
