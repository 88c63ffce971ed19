/**
 * Drizzle Implementation: LinkSynchronizer (ASYNC API)
 *
 * better-sqlite3 is synchronous, but we expose async API.
 */
import { and, asc, eq, inArray } from "drizzle-orm";
import { logger } from "../../config/logger.js";
import type { DrizzleExecutor } from "../../db/index.js";
import { botKnowledgeLinks } from "../../db/schema/bot-knowledge-links.js";
import type { StorageAccessor } from "../../db/storage-accessor.js";
import type { LinkSynchronizer } from "../../domain/repositories/link-synchronizer.js";
import { assertRowKey, parseKnowledgeKeys } from "../../domain/tables.js";
import type { ReadCache } from "./read-cache.js";

/** Delete the links of the given bots. Runs on the caller's connection or transaction. */
export function deleteLinksForBots(tx: DrizzleExecutor, botKeys: readonly number[]): number {
  if (botKeys.length === 0) return 0;
  return tx
    .delete(botKnowledgeLinks)
    .where(inArray(botKnowledgeLinks.Bot_ID, [...botKeys]))
    .run().changes;
}

/** Delete the links to the given knowledge entries. Runs on the caller's connection or transaction. */
export function deleteLinksForKnowledge(tx: DrizzleExecutor, knowledgeKeys: readonly number[]): number {
  if (knowledgeKeys.length === 0) return 0;
  return tx
    .delete(botKnowledgeLinks)
    .where(inArray(botKnowledgeLinks.KnowledgeBase_ID, [...knowledgeKeys]))
    .run().changes;
}

export class DrizzleLinkSynchronizer implements LinkSynchronizer {
  constructor(
    private readonly storage: StorageAccessor,
    private readonly cache: ReadCache,
  ) {}

  async linkIfAbsent(botKey: number, knowledgeKeys: readonly number[]): Promise<number> {
    assertRowKey(botKey, "Bot_ID");
    const keys = parseKnowledgeKeys(knowledgeKeys);
    if (keys.length === 0) return 0;

    try {
      const created = this.storage.withTransaction("link bot to knowledge", (tx) => {
        let inserted = 0;
        for (const knowledgeKey of keys) {
          const existing = tx
            .select()
            .from(botKnowledgeLinks)
            .where(and(eq(botKnowledgeLinks.Bot_ID, botKey), eq(botKnowledgeLinks.KnowledgeBase_ID, knowledgeKey)))
            .get();
          if (existing) continue;

          tx.insert(botKnowledgeLinks).values({ Bot_ID: botKey, KnowledgeBase_ID: knowledgeKey }).run();
          inserted++;
        }
        return inserted;
      });
      logger.info(`Linked bot ${botKey} to ${created} knowledge entries`, { requested: keys.length });
      return created;
    } finally {
      this.cache.invalidate();
    }
  }

  async replaceLinks(botKey: number, knowledgeKeys: readonly number[]): Promise<void> {
    assertRowKey(botKey, "Bot_ID");
    const keys = parseKnowledgeKeys(knowledgeKeys);

    try {
      const removed = this.storage.withTransaction("replace bot links", (tx) => {
        const deleted = deleteLinksForBots(tx, [botKey]);
        for (const knowledgeKey of keys) {
          tx.insert(botKnowledgeLinks).values({ Bot_ID: botKey, KnowledgeBase_ID: knowledgeKey }).run();
        }
        return deleted;
      });
      logger.info(`Replaced links of bot ${botKey}`, { removed, added: keys.length });
    } finally {
      this.cache.invalidate();
    }
  }

  async cascadeDeleteForBot(botKey: number): Promise<number> {
    assertRowKey(botKey, "Bot_ID");
    try {
      return this.storage.withTransaction("delete bot links", (tx) => deleteLinksForBots(tx, [botKey]));
    } finally {
      this.cache.invalidate();
    }
  }

  async cascadeDeleteForKnowledge(knowledgeKey: number): Promise<number> {
    assertRowKey(knowledgeKey, "KnowledgeBase_ID");
    try {
      return this.storage.withTransaction("delete knowledge links", (tx) => deleteLinksForKnowledge(tx, [knowledgeKey]));
    } finally {
      this.cache.invalidate();
    }
  }

  async listLinkedKnowledge(botKey: number): Promise<number[]> {
    assertRowKey(botKey, "Bot_ID");
    return this.storage.withConnection("list bot links", (db) =>
      db
        .select({ knowledgeKey: botKnowledgeLinks.KnowledgeBase_ID })
        .from(botKnowledgeLinks)
        .where(eq(botKnowledgeLinks.Bot_ID, botKey))
        .orderBy(asc(botKnowledgeLinks.KnowledgeBase_ID))
        .all()
        .map((row) => row.knowledgeKey),
    );
  }
}
