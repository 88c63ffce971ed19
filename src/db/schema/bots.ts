import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Bots table: one row per chatbot persona.
 *
 * Column names are part of the contract with the console UI and are kept
 * verbatim (including their casing) in both SQL and TypeScript.
 */
export const bots = sqliteTable("Bots", {
  Bot_ID: integer("Bot_ID").primaryKey({ autoIncrement: true }),
  /** Display name; the external identifier used by update and delete flows */
  Botperson_Name: text("Botperson_Name").notNull().unique(),
  Botperson_Role: text("Botperson_Role"),
  Role: text("Role"),
  Usage: text("Usage"),
  Sector: text("Sector"),
  Prompt: text("Prompt"),
  Total_Interactions: integer("Total_Interactions"),
  Positive_Feedback_Count: integer("Positive_Feedback_Count"),
  Negative_Feedback_Count: integer("Negative_Feedback_Count"),
  /** e.g. "Full", "Restricted" */
  Level_of_Access: text("Level_of_Access"),
  /** "Active" | "Inactive" */
  Active_Status: text("Active_Status"),
  Version: text("Version"),
  Owner_Maintainer: text("Owner_Maintainer"),
  Foundation_Business: text("Foundation_Business"),
  Foundation_Name: text("Foundation_Name"),
  /** YYYY-MM-DD */
  Last_Updated: text("Last_Updated"),
});
