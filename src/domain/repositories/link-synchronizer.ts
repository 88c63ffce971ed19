/**
 * Repository Interface: LinkSynchronizer (ASYNC)
 *
 * Keeps BotKnowledgeLink consistent with editor intent: no duplicate pairs,
 * no links pointing at missing parents.
 */

export interface LinkSynchronizer {
  /**
   * Link the bot to each knowledge entry that is not linked yet.
   * Idempotent. Returns the number of links created.
   */
  linkIfAbsent(botKey: number, knowledgeKeys: readonly number[]): Promise<number>;

  /**
   * Make the bot's links exactly `knowledgeKeys`. All-or-nothing: if any insert
   * fails the previous link set is left in place.
   */
  replaceLinks(botKey: number, knowledgeKeys: readonly number[]): Promise<void>;

  /** Remove every link of a bot. Returns the number removed. */
  cascadeDeleteForBot(botKey: number): Promise<number>;

  /** Remove every link to a knowledge entry. Returns the number removed. */
  cascadeDeleteForKnowledge(knowledgeKey: number): Promise<number>;

  /** Knowledge keys currently linked to a bot, ascending. */
  listLinkedKnowledge(botKey: number): Promise<number[]>;
}
