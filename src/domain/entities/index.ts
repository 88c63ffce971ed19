export { type NewBot, newBotSchema, REQUIRED_BOT_FIELDS } from "./bot.js";
export { type KnowledgeOption, type NewKnowledgeEntry, newKnowledgeEntrySchema } from "./knowledge-entry.js";
