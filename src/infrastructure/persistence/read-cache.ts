import { LRUCache } from "lru-cache";
import { logger } from "../../config/logger.js";
import type { TableName, TableRow } from "../../domain/tables.js";

const ROWS = "rows";

type TableCaches = { [T in TableName]: LRUCache<typeof ROWS, TableRow<T>[]> };

/**
 * Time-bounded cache of full-table reads.
 *
 * Advisory only: every write clears it before returning, so a read that
 * follows a write always goes to the store. A TTL of 0 disables caching.
 */
export class ReadCache {
  private readonly caches: TableCaches;

  constructor(private readonly ttlMs: number) {
    // lru-cache treats ttl 0 as "never expires", so disabled caches get no entries at all.
    const ttl = Math.max(ttlMs, 1);
    this.caches = {
      Bots: new LRUCache<typeof ROWS, TableRow<"Bots">[]>({ max: 1, ttl }),
      KnowledgeBase: new LRUCache<typeof ROWS, TableRow<"KnowledgeBase">[]>({ max: 1, ttl }),
      BotKnowledgeLink: new LRUCache<typeof ROWS, TableRow<"BotKnowledgeLink">[]>({ max: 1, ttl }),
    };
  }

  get<T extends TableName>(table: T): TableRow<T>[] | undefined {
    const cache: LRUCache<typeof ROWS, TableRow<T>[]> = this.caches[table];
    return cache.get(ROWS);
  }

  set<T extends TableName>(table: T, rows: TableRow<T>[]): void {
    if (this.ttlMs <= 0) return;
    const cache: LRUCache<typeof ROWS, TableRow<T>[]> = this.caches[table];
    cache.set(ROWS, rows);
  }

  /** Cached rows when fresh, otherwise load, remember and return. */
  getOrLoad<T extends TableName>(table: T, load: () => TableRow<T>[]): TableRow<T>[] {
    const cached = this.get(table);
    if (cached) return cached;
    const rows = load();
    this.set(table, rows);
    return rows;
  }

  /** Drop every cached table. */
  invalidate(): void {
    for (const cache of Object.values(this.caches)) {
      cache.clear();
    }
    logger.debug("Read cache invalidated");
  }
}
