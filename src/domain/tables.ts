import { getTableColumns } from "drizzle-orm";
import { botKnowledgeLinks } from "../db/schema/bot-knowledge-links.js";
import { bots } from "../db/schema/bots.js";
import { knowledgeBase } from "../db/schema/knowledge-base.js";
import { ValidationError } from "./errors.js";

/**
 * The fixed set of tables the console may touch. Every table or column name
 * that reaches SQL is checked against this registry first.
 */
export const ENTITY_TABLES = {
  Bots: bots,
  KnowledgeBase: knowledgeBase,
  BotKnowledgeLink: botKnowledgeLinks,
} as const;

export type TableName = keyof typeof ENTITY_TABLES;
export type EntityTable<T extends TableName> = (typeof ENTITY_TABLES)[T];
export type TableRow<T extends TableName> = EntityTable<T>["$inferSelect"];
export type TableInsert<T extends TableName> = EntityTable<T>["$inferInsert"];
export type ColumnName<T extends TableName> = keyof TableRow<T> & string;

/** Scalar values the store holds. */
export type CellValue = string | number | null;

export function isCellValue(value: unknown): value is CellValue {
  return value === null || typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

export const TABLE_NAMES: readonly TableName[] = ["Bots", "KnowledgeBase", "BotKnowledgeLink"];

/** Parent tables and the link column that points at each of them. */
export type ParentTable = Exclude<TableName, "BotKnowledgeLink">;

export const PRIMARY_KEYS = {
  Bots: "Bot_ID",
  KnowledgeBase: "ID",
} as const satisfies { [T in ParentTable]: ColumnName<T> };

/** Column the console uses to pick a record for update or delete. */
export const IDENTIFIER_COLUMNS = {
  Bots: "Botperson_Name",
  KnowledgeBase: "ID",
  BotKnowledgeLink: "Bot_ID",
} as const satisfies { [T in TableName]: ColumnName<T> };

/** Column a table view must always show. */
export const REQUIRED_VIEW_COLUMNS = {
  Bots: "Bot_ID",
  KnowledgeBase: "ID",
  BotKnowledgeLink: "Bot_ID",
} as const satisfies { [T in TableName]: ColumnName<T> };

export function isTableName(name: string): name is TableName {
  return (TABLE_NAMES as readonly string[]).includes(name);
}

export function isParentTable(name: TableName): name is ParentTable {
  return name !== "BotKnowledgeLink";
}

export function assertTableName(name: string): TableName {
  if (!isTableName(name)) {
    throw new ValidationError(`Unknown table "${name}"`, ["table"]);
  }
  return name;
}

/**
 * Column names per table, in schema order. Property keys in the schema are
 * spelled exactly like the SQL columns, so the keys are the column names.
 */
const COLUMN_NAMES: { [T in TableName]: readonly string[] } = {
  Bots: Object.keys(getTableColumns(bots)),
  KnowledgeBase: Object.keys(getTableColumns(knowledgeBase)),
  BotKnowledgeLink: Object.keys(getTableColumns(botKnowledgeLinks)),
};

export function columnNames(table: TableName): readonly string[] {
  return COLUMN_NAMES[table];
}

export function isColumnOf<T extends TableName>(table: T, name: string): name is ColumnName<T> {
  return COLUMN_NAMES[table].includes(name);
}

/** Reject a column name that is not part of the table. */
export function assertColumnName(table: TableName, name: string): string {
  if (!COLUMN_NAMES[table].includes(name)) {
    throw new ValidationError(`Unknown column "${name}" on table ${table}`, [name]);
  }
  return name;
}

export function assertRowKey(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer, got ${String(value)}`, [field]);
  }
  return value;
}

/** Validate a knowledge selection and drop repeats, keeping first-seen order. */
export function parseKnowledgeKeys(keys: readonly number[]): number[] {
  return [...new Set(keys.map((key) => assertRowKey(key, "KnowledgeBase_ID")))];
}
