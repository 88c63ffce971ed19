import { z } from "zod";
import type { TableInsert } from "../tables.js";

export type NewBot = TableInsert<"Bots">;

/** Fields a bot cannot be created without. */
export const REQUIRED_BOT_FIELDS = ["Botperson_Name", "Botperson_Role", "Role", "Usage", "Sector", "Prompt"] as const;

const requiredText = z.string().trim().min(1);
const optionalText = z.string().nullish();
const optionalCount = z.coerce.number().int().min(0).nullish();

/**
 * Shape of a bot submitted by the console. Counters arrive as text from form
 * fields and are coerced; blank optional values are normalised to null later.
 */
export const newBotSchema = z.object({
  Botperson_Name: requiredText,
  Botperson_Role: requiredText,
  Role: requiredText,
  Usage: requiredText,
  Sector: requiredText,
  Prompt: requiredText,
  Total_Interactions: optionalCount,
  Positive_Feedback_Count: optionalCount,
  Negative_Feedback_Count: optionalCount,
  Level_of_Access: optionalText,
  Active_Status: optionalText,
  Version: optionalText,
  Owner_Maintainer: optionalText,
  Foundation_Business: optionalText,
  Foundation_Name: optionalText,
  Last_Updated: optionalText,
});
