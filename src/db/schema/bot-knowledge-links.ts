import { index, integer, primaryKey, sqliteTable } from "drizzle-orm/sqlite-core";
import { bots } from "./bots.js";
import { knowledgeBase } from "./knowledge-base.js";

/**
 * Join table between Bots and KnowledgeBase.
 * The composite primary key makes each (bot, knowledge entry) pair unique.
 * Rows are only ever inserted or deleted, never updated in place.
 */
export const botKnowledgeLinks = sqliteTable(
  "BotKnowledgeLink",
  {
    Bot_ID: integer("Bot_ID")
      .notNull()
      .references(() => bots.Bot_ID),
    KnowledgeBase_ID: integer("KnowledgeBase_ID")
      .notNull()
      .references(() => knowledgeBase.ID),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.Bot_ID, table.KnowledgeBase_ID] }),
    kbIdx: index("idx_bot_knowledge_link_kb").on(table.KnowledgeBase_ID),
  }),
);
