/**
 * Drizzle Implementation: EntityRepository (ASYNC API)
 *
 * Table and column names come from the enumerated registry in domain/tables
 * and reach SQL only through sql.identifier(); values are always bound.
 */
import { type SQL, sql } from "drizzle-orm";
import { logger } from "../../config/logger.js";
import type { DrizzleExecutor } from "../../db/index.js";
import type { StorageAccessor } from "../../db/storage-accessor.js";
import { blankToNull } from "../../domain/defaults.js";
import { ValidationError } from "../../domain/errors.js";
import type { EntityRepository } from "../../domain/repositories/entity-repository.js";
import {
  assertColumnName,
  type CellValue,
  type ColumnName,
  isCellValue,
  isParentTable,
  type ParentTable,
  PRIMARY_KEYS,
  type TableInsert,
  type TableName,
  type TableRow,
} from "../../domain/tables.js";
import { deleteLinksForBots, deleteLinksForKnowledge } from "./drizzle-link-synchronizer.js";
import type { ReadCache } from "./read-cache.js";

/**
 * Validate column names and values of a row, dropping undefined entries.
 * Empty strings become null.
 */
function toAssignments(table: TableName, values: object): Array<[string, CellValue]> {
  const entries: Array<[string, unknown]> = Object.entries(values);
  const assignments: Array<[string, CellValue]> = [];
  for (const [column, value] of entries) {
    if (value === undefined) continue;
    assertColumnName(table, column);
    if (!isCellValue(value)) {
      throw new ValidationError(`Unsupported value for column "${column}"`, [column]);
    }
    assignments.push([column, blankToNull(value)]);
  }
  return assignments;
}

function columnList(assignments: Array<[string, CellValue]>): SQL {
  return sql.join(
    assignments.map(([column]) => sql.identifier(column)),
    sql`, `,
  );
}

function valueList(assignments: Array<[string, CellValue]>): SQL {
  return sql.join(
    assignments.map(([, value]) => sql`${value}`),
    sql`, `,
  );
}

/** Primary keys of the parent rows a delete will hit. */
function resolveParentKeys(tx: DrizzleExecutor, table: ParentTable, keyColumn: string, keyValue: CellValue): number[] {
  const primaryKey = PRIMARY_KEYS[table];
  if (keyColumn === primaryKey && typeof keyValue === "number") return [keyValue];

  const rows = tx.all<{ parent_key: number }>(
    sql`SELECT ${sql.identifier(primaryKey)} AS parent_key FROM ${sql.identifier(table)} WHERE ${sql.identifier(keyColumn)} = ${keyValue}`,
  );
  return rows.map((row) => row.parent_key);
}

export class DrizzleEntityRepository implements EntityRepository {
  constructor(
    private readonly storage: StorageAccessor,
    private readonly cache: ReadCache,
  ) {}

  async readAll<T extends TableName>(table: T): Promise<TableRow<T>[]> {
    return this.cache.getOrLoad(table, () =>
      this.storage.withConnection(`read ${table}`, (db) =>
        db.all<TableRow<T>>(sql`SELECT * FROM ${sql.identifier(table)} ORDER BY rowid`),
      ),
    );
  }

  async insert<T extends TableName>(table: T, row: TableInsert<T>): Promise<number> {
    const assignments = toAssignments(table, row);
    const target = sql.identifier(table);
    const statement =
      assignments.length === 0
        ? sql`INSERT INTO ${target} DEFAULT VALUES`
        : sql`INSERT INTO ${target} (${columnList(assignments)}) VALUES (${valueList(assignments)})`;

    try {
      const key = this.storage.withConnection(`insert into ${table}`, (db) => Number(db.run(statement).lastInsertRowid));
      logger.info(`Inserted row into ${table}`, { key });
      return key;
    } finally {
      this.cache.invalidate();
    }
  }

  async updateByKey<T extends TableName>(
    table: T,
    keyColumn: ColumnName<T>,
    keyValue: CellValue,
    values: Partial<Record<ColumnName<T>, CellValue>>,
  ): Promise<number> {
    assertColumnName(table, keyColumn);
    const assignments = toAssignments(table, values);
    if (assignments.length === 0) return 0;

    const setClause = sql.join(
      assignments.map(([column, value]) => sql`${sql.identifier(column)} = ${value}`),
      sql`, `,
    );

    try {
      const changed = this.storage.withConnection(
        `update ${table}`,
        (db) =>
          db.run(sql`UPDATE ${sql.identifier(table)} SET ${setClause} WHERE ${sql.identifier(keyColumn)} = ${keyValue}`)
            .changes,
      );
      logger.info(`Updated ${changed} row(s) in ${table}`, { keyColumn, columns: assignments.length });
      return changed;
    } finally {
      this.cache.invalidate();
    }
  }

  async deleteByKey<T extends TableName>(table: T, keyColumn: ColumnName<T>, keyValue: CellValue): Promise<number> {
    assertColumnName(table, keyColumn);

    try {
      const { deleted, links } = this.storage.withTransaction(`delete from ${table}`, (tx) => {
        let removedLinks = 0;
        // Dependent links go first so the parent delete never trips the foreign keys.
        if (isParentTable(table)) {
          const parentKeys = resolveParentKeys(tx, table, keyColumn, keyValue);
          removedLinks =
            table === "Bots" ? deleteLinksForBots(tx, parentKeys) : deleteLinksForKnowledge(tx, parentKeys);
        }
        const removed = tx.run(
          sql`DELETE FROM ${sql.identifier(table)} WHERE ${sql.identifier(keyColumn)} = ${keyValue}`,
        ).changes;
        return { deleted: removed, links: removedLinks };
      });
      logger.info(`Deleted ${deleted} row(s) from ${table}`, { keyColumn, links });
      return deleted;
    } finally {
      this.cache.invalidate();
    }
  }
}
