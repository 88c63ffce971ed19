import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConstraintViolation } from "../../domain/errors.js";
import { countRows, createTestStore, seedBot, seedKnowledge, seedLink, type TestStore } from "../../test/db.js";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("DrizzleEntityRepository", () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  describe("readAll", () => {
    it("returns every row in insertion order", async () => {
      seedKnowledge(store.sqlite, "first");
      seedKnowledge(store.sqlite, "second");
      const rows = await store.entities.readAll("KnowledgeBase");
      expect(rows.map((row) => row.Content)).toEqual(["first", "second"]);
    });

    it("returns an empty list for an empty table", async () => {
      expect(await store.entities.readAll("BotKnowledgeLink")).toEqual([]);
    });
  });

  describe("insert", () => {
    it("returns the assigned key and the row is readable right away", async () => {
      await store.entities.readAll("KnowledgeBase"); // warm the cache
      const id = await store.entities.insert("KnowledgeBase", { Content: "Shipping times", Metadata: "faq" });

      expect(id).toBe(1);
      expect(await store.entities.readAll("KnowledgeBase")).toEqual([
        { ID: 1, Content: "Shipping times", Metadata: "faq" },
      ]);
    });

    it("honours an explicit primary key", async () => {
      const id = await store.entities.insert("KnowledgeBase", { ID: 42, Content: "pinned" });
      expect(id).toBe(42);
    });

    it("stores empty strings as null", async () => {
      const id = await store.entities.insert("KnowledgeBase", { Content: "", Metadata: "m" });
      const [row] = await store.entities.readAll("KnowledgeBase");
      expect(row).toEqual({ ID: id, Content: null, Metadata: "m" });
    });

    it("inserts default values when no column is given", async () => {
      const id = await store.entities.insert("KnowledgeBase", {});
      expect(await store.entities.readAll("KnowledgeBase")).toEqual([{ ID: id, Content: null, Metadata: null }]);
    });

    it("rejects a duplicate bot name as a constraint violation", async () => {
      await store.entities.insert("Bots", { Botperson_Name: "Aida" });
      await expect(store.entities.insert("Bots", { Botperson_Name: "Aida" })).rejects.toBeInstanceOf(
        ConstraintViolation,
      );
      expect(countRows(store.sqlite, "Bots")).toBe(1);
    });

    it("rejects a link to a missing knowledge entry", async () => {
      const botId = seedBot(store.sqlite, "Aida");
      await expect(
        store.entities.insert("BotKnowledgeLink", { Bot_ID: botId, KnowledgeBase_ID: 99 }),
      ).rejects.toMatchObject({ kind: "constraint_violation", code: "SQLITE_CONSTRAINT_FOREIGNKEY" });
    });
  });

  describe("updateByKey", () => {
    it("updates matching rows and reports how many changed", async () => {
      seedBot(store.sqlite, "Aida");
      const changed = await store.entities.updateByKey("Bots", "Botperson_Name", "Aida", {
        Role: "Tutor",
        Version: "",
      });

      expect(changed).toBe(1);
      const [bot] = await store.entities.readAll("Bots");
      expect(bot).toMatchObject({ Botperson_Name: "Aida", Role: "Tutor", Version: null });
    });

    it("returns 0 when nothing matches", async () => {
      expect(await store.entities.updateByKey("KnowledgeBase", "ID", 7, { Content: "x" })).toBe(0);
    });

    it("returns 0 without touching the store when there is nothing to set", async () => {
      seedKnowledge(store.sqlite, "unchanged");
      expect(await store.entities.updateByKey("KnowledgeBase", "ID", 1, {})).toBe(0);
    });
  });

  describe("deleteByKey", () => {
    it("removes a bot's links together with the bot", async () => {
      const aida = seedBot(store.sqlite, "Aida");
      const milo = seedBot(store.sqlite, "Milo");
      const kb = seedKnowledge(store.sqlite, "policies");
      seedLink(store.sqlite, aida, kb);
      seedLink(store.sqlite, milo, kb);

      const deleted = await store.entities.deleteByKey("Bots", "Botperson_Name", "Aida");

      expect(deleted).toBe(1);
      expect(await store.entities.readAll("Bots")).toHaveLength(1);
      expect(await store.entities.readAll("BotKnowledgeLink")).toEqual([{ Bot_ID: milo, KnowledgeBase_ID: kb }]);
      expect(countRows(store.sqlite, "KnowledgeBase")).toBe(1);
    });

    it("removes a knowledge entry's links together with the entry", async () => {
      const aida = seedBot(store.sqlite, "Aida");
      const kept = seedKnowledge(store.sqlite, "kept");
      const dropped = seedKnowledge(store.sqlite, "dropped");
      seedLink(store.sqlite, aida, kept);
      seedLink(store.sqlite, aida, dropped);

      const deleted = await store.entities.deleteByKey("KnowledgeBase", "ID", dropped);

      expect(deleted).toBe(1);
      expect(await store.entities.readAll("BotKnowledgeLink")).toEqual([{ Bot_ID: aida, KnowledgeBase_ID: kept }]);
    });

    it("returns 0 when no row matches", async () => {
      expect(await store.entities.deleteByKey("Bots", "Botperson_Name", "Nobody")).toBe(0);
    });

    it("leaves the bot and its links untouched when the parent delete fails", async () => {
      const aida = seedBot(store.sqlite, "Aida");
      const kb = seedKnowledge(store.sqlite, "policies");
      seedLink(store.sqlite, aida, kb);
      store.sqlite.exec(
        "CREATE TRIGGER block_bot_delete BEFORE DELETE ON Bots BEGIN SELECT RAISE(ABORT, 'bot deletion blocked'); END;",
      );

      await expect(store.entities.deleteByKey("Bots", "Bot_ID", aida)).rejects.toMatchObject({
        message: "bot deletion blocked",
      });

      expect(countRows(store.sqlite, "Bots")).toBe(1);
      expect(countRows(store.sqlite, "BotKnowledgeLink")).toBe(1);
    });
  });
});
