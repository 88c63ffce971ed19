import { sql } from "drizzle-orm";
import type { DrizzleExecutor } from "./index.js";

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS Bots (
    Bot_ID INTEGER PRIMARY KEY AUTOINCREMENT,
    Botperson_Name TEXT NOT NULL UNIQUE,
    Botperson_Role TEXT,
    Role TEXT,
    Usage TEXT,
    Sector TEXT,
    Prompt TEXT,
    Total_Interactions INTEGER,
    Positive_Feedback_Count INTEGER,
    Negative_Feedback_Count INTEGER,
    Level_of_Access TEXT,
    Active_Status TEXT,
    Version TEXT,
    Owner_Maintainer TEXT,
    Foundation_Business TEXT,
    Foundation_Name TEXT,
    Last_Updated TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS KnowledgeBase (
    ID INTEGER PRIMARY KEY AUTOINCREMENT,
    Content TEXT,
    Metadata TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS BotKnowledgeLink (
    Bot_ID INTEGER NOT NULL REFERENCES Bots (Bot_ID),
    KnowledgeBase_ID INTEGER NOT NULL REFERENCES KnowledgeBase (ID),
    PRIMARY KEY (Bot_ID, KnowledgeBase_ID)
  )`,
  "CREATE INDEX IF NOT EXISTS idx_bot_knowledge_link_kb ON BotKnowledgeLink (KnowledgeBase_ID)",
];

/**
 * Create the console tables when they are missing. Existing tables are left
 * untouched; there is no migration step.
 */
export function ensureSchema(db: DrizzleExecutor): void {
  for (const statement of SCHEMA_STATEMENTS) {
    db.run(sql.raw(statement));
  }
}
