import { z } from "zod";
import type { TableInsert } from "../tables.js";

export type NewKnowledgeEntry = TableInsert<"KnowledgeBase">;

export const newKnowledgeEntrySchema = z.object({
  /** Left blank, the store assigns the next key. */
  ID: z.coerce
    .number()
    .int()
    .positive()
    .nullish()
    .transform((id) => id ?? undefined),
  Content: z.string().nullish(),
  Metadata: z.string().nullish(),
});


/** Option shown when picking knowledge entries to link to a bot. */
export interface KnowledgeOption {
  ID: number;
  Content: string | null;
}
