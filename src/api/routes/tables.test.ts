import type { Hono } from "hono";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConsoleService } from "../../console/console-service.js";
import { createTestStore, seedBot, seedKnowledge, seedLink, type TestStore } from "../../test/db.js";
import { createTableRoutes, parseColumnList } from "./tables.js";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const aida = {
  Botperson_Name: "Aida",
  Botperson_Role: "Assistant",
  Role: "Support",
  Usage: "Chat",
  Sector: "Retail",
  Prompt: "You answer order questions.",
};

function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

describe("parseColumnList", () => {
  it("splits, trims and drops empty names", () => {
    expect(parseColumnList("Role, Sector,,")).toEqual(["Role", "Sector"]);
    expect(parseColumnList(undefined)).toBeUndefined();
  });
});

describe("table routes", () => {
  let store: TestStore;
  let routes: Hono;

  beforeEach(() => {
    store = createTestStore();
    routes = createTableRoutes(
      new ConsoleService({
        entities: store.entities,
        links: store.links,
        botOwner: "Ops Team",
        now: () => new Date(2024, 5, 1),
      }),
    );
  });

  describe("GET /tables/:table", () => {
    it("returns the table view", async () => {
      seedKnowledge(store.sqlite, "returns");
      seedKnowledge(store.sqlite, "shipping");

      const res = await routes.request("/tables/KnowledgeBase?columns=Content&sortBy=ID&order=desc");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        table: "KnowledgeBase",
        columns: ["ID", "Content"],
        rows: [
          { ID: 2, Content: "shipping" },
          { ID: 1, Content: "returns" },
        ],
        warning: "The 'ID' column cannot be removed.",
      });
    });

    it("filters on a column", async () => {
      seedKnowledge(store.sqlite, "returns");
      seedKnowledge(store.sqlite, "shipping");

      const res = await routes.request("/tables/KnowledgeBase?filterColumn=Content&filterValue=SHIP");

      expect(await res.json()).toMatchObject({ rows: [{ ID: 2, Content: "shipping", Metadata: "seed" }] });
    });

    it("rejects an unknown table with 400", async () => {
      const res = await routes.request("/tables/Users");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Unknown table "Users"',
        kind: "validation_error",
        fields: ["table"],
      });
    });

    it("rejects an invalid sort order with 400", async () => {
      const res = await routes.request("/tables/Bots?sortBy=Bot_ID&order=sideways");
      expect(res.status).toBe(400);
    });
  });

  describe("POST /tables/:table", () => {
    it("creates a bot and links its knowledge with 201", async () => {
      const kb = seedKnowledge(store.sqlite, "returns");

      const res = await routes.request("/tables/Bots", jsonRequest("POST", { values: aida, knowledgeIds: [kb] }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        ok: true,
        message: "Bot added successfully and linked to KnowledgeBase",
        id: 1,
        linked: 1,
      });
    });

    it("creates a knowledge entry with 201", async () => {
      const res = await routes.request("/tables/KnowledgeBase", jsonRequest("POST", { values: { Content: "FAQ" } }));
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ ok: true, id: 1 });
    });

    it("answers 400 for a malformed body", async () => {
      const res = await routes.request("/tables/Bots", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body", kind: "validation_error" });
    });

    it("answers 400 when knowledgeIds is not a list of integers", async () => {
      const res = await routes.request("/tables/Bots", jsonRequest("POST", { values: aida, knowledgeIds: "1,2" }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid request body: knowledgeIds", kind: "validation_error" });
    });

    it("answers 409 with the new bot ID when a linked entry does not exist", async () => {
      const res = await routes.request("/tables/Bots", jsonRequest("POST", { values: aida, knowledgeIds: [99] }));
      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ kind: "constraint_violation", botId: 1 });
    });

    it("answers 409 for a duplicate bot name", async () => {
      seedBot(store.sqlite, "Aida");
      const res = await routes.request("/tables/Bots", jsonRequest("POST", { values: aida }));
      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ kind: "constraint_violation" });
    });

    it("answers 400 when required fields are missing", async () => {
      const res = await routes.request("/tables/Bots", jsonRequest("POST", { values: { Botperson_Name: "Aida" } }));
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ fields: ["Botperson_Role", "Role", "Usage", "Sector", "Prompt"] });
    });
  });

  describe("PATCH /tables/:table/:identifier", () => {
    it("updates a bot and replaces its links", async () => {
      const botId = seedBot(store.sqlite, "Aida");
      const k1 = seedKnowledge(store.sqlite, "returns");
      const k2 = seedKnowledge(store.sqlite, "shipping");
      seedLink(store.sqlite, botId, k1);

      const res = await routes.request(
        "/tables/Bots/Aida",
        jsonRequest("PATCH", { values: { Role: "Tutor" }, knowledgeIds: [k2] }),
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ok: true, message: "Record updated successfully", updated: 1 });
      expect(await store.links.listLinkedKnowledge(botId)).toEqual([k2]);
    });

    it("answers 404 for an unknown bot", async () => {
      const res = await routes.request("/tables/Bots/Nobody", jsonRequest("PATCH", { values: { Role: "x" } }));
      expect(res.status).toBe(404);
    });
  });

  describe("DELETE /tables/:table/:identifier", () => {
    it("deletes a knowledge entry", async () => {
      const id = seedKnowledge(store.sqlite, "returns");
      const res = await routes.request(`/tables/KnowledgeBase/${id}`, { method: "DELETE" });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ok: true, message: "Record deleted successfully", deleted: 1 });
    });

    it("answers 404 when nothing matches", async () => {
      const res = await routes.request("/tables/KnowledgeBase/3", { method: "DELETE" });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "No KnowledgeBase row with ID 3", kind: "not_found" });
    });
  });

  describe("knowledge lookups", () => {
    it("GET /bots/:botId/knowledge lists linked entries", async () => {
      const botId = seedBot(store.sqlite, "Aida");
      const kb = seedKnowledge(store.sqlite, "returns");
      seedLink(store.sqlite, botId, kb);

      const res = await routes.request(`/bots/${botId}/knowledge`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ botId, knowledgeIds: [kb] });
    });

    it("GET /bots/:botId/knowledge answers 400 for a non-numeric id", async () => {
      const res = await routes.request("/bots/aida/knowledge");
      expect(res.status).toBe(400);
    });

    it("GET /knowledge-options lists every entry", async () => {
      seedKnowledge(store.sqlite, "returns");
      const res = await routes.request("/knowledge-options");
      expect(await res.json()).toEqual({ options: [{ ID: 1, Content: "returns" }] });
    });
  });
});
