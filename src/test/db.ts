import Database from "better-sqlite3";
import { ensureSchema } from "../db/bootstrap.js";
import { createDb, type DrizzleDb } from "../db/index.js";
import { SharedConnectionProvider, StorageAccessor } from "../db/storage-accessor.js";
import { DrizzleEntityRepository } from "../infrastructure/persistence/drizzle-entity-repository.js";
import { DrizzleLinkSynchronizer } from "../infrastructure/persistence/drizzle-link-synchronizer.js";
import { ReadCache } from "../infrastructure/persistence/read-cache.js";

export interface TestStore {
  /** Raw handle, for seeding and for fault injection (triggers). */
  sqlite: Database.Database;
  db: DrizzleDb;
  storage: StorageAccessor;
  cache: ReadCache;
  entities: DrizzleEntityRepository;
  links: DrizzleLinkSynchronizer;
}

/** In-memory store with the console tables created and foreign keys on. */
export function createTestStore(options: { ttlMs?: number } = {}): TestStore {
  const sqlite = new Database(":memory:");
  const storage = new StorageAccessor(new SharedConnectionProvider(sqlite));
  storage.withTransaction("ensure schema", (tx) => ensureSchema(tx));
  const cache = new ReadCache(options.ttlMs ?? 60_000);
  return {
    sqlite,
    db: createDb(sqlite),
    storage,
    cache,
    entities: new DrizzleEntityRepository(storage, cache),
    links: new DrizzleLinkSynchronizer(storage, cache),
  };
}

export function countRows(sqlite: Database.Database, table: string): number {
  const row: unknown = sqlite.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get();
  if (typeof row === "object" && row !== null && "n" in row && typeof row.n === "number") return row.n;
  throw new Error(`Could not count rows of ${table}`);
}

export function seedBot(sqlite: Database.Database, name: string): number {
  const result = sqlite
    .prepare("INSERT INTO Bots (Botperson_Name, Botperson_Role, Role, Usage, Sector, Prompt) VALUES (?, ?, ?, ?, ?, ?)")
    .run(name, "Assistant", "Support", "Chat", "Retail", `You are ${name}.`);
  return Number(result.lastInsertRowid);
}

export function seedKnowledge(sqlite: Database.Database, content: string, id?: number): number {
  const result =
    id === undefined
      ? sqlite.prepare("INSERT INTO KnowledgeBase (Content, Metadata) VALUES (?, ?)").run(content, "seed")
      : sqlite.prepare("INSERT INTO KnowledgeBase (ID, Content, Metadata) VALUES (?, ?, ?)").run(id, content, "seed");
  return Number(result.lastInsertRowid);
}

export function seedLink(sqlite: Database.Database, botId: number, knowledgeId: number): void {
  sqlite.prepare("INSERT INTO BotKnowledgeLink (Bot_ID, KnowledgeBase_ID) VALUES (?, ?)").run(botId, knowledgeId);
}
