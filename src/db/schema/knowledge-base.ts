import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/** Knowledge-base documents that bots can be linked to. */
export const knowledgeBase = sqliteTable("KnowledgeBase", {
  ID: integer("ID").primaryKey({ autoIncrement: true }),
  Content: text("Content"),
  Metadata: text("Metadata"),
});
