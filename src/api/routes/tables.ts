import { Hono } from "hono";
import { z } from "zod";
import type { ConsoleService } from "../../console/console-service.js";
import type { OperationFailure, PartialFailure } from "../../console/operation-status.js";
import { getConsoleService } from "../../console/services.js";
import type { ViewRequest } from "../../console/view-settings.js";
import type { ConsoleErrorKind } from "../../domain/errors.js";

const HTTP_STATUS = {
  validation_error: 400,
  not_found: 404,
  constraint_violation: 409,
  storage_error: 500,
} as const satisfies Record<ConsoleErrorKind, number>;

const recordBodySchema = z.object({
  values: z.record(z.unknown()).default({}),
  knowledgeIds: z.array(z.number().int()).optional(),
});

const viewQuerySchema = z.object({
  columns: z.string().optional(),
  sortBy: z.string().min(1).optional(),
  order: z.enum(["asc", "desc"]).optional(),
  filterColumn: z.string().min(1).optional(),
  filterValue: z.string().optional(),
});

type RecordBody = z.infer<typeof recordBodySchema>;

/** Split "a, b,,c" into ["a", "b", "c"]. */
export function parseColumnList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
}

function toViewRequest(query: z.infer<typeof viewQuerySchema>): ViewRequest {
  const request: ViewRequest = {
    columns: parseColumnList(query.columns),
    sortBy: query.sortBy,
    order: query.order,
  };
  if (query.filterColumn !== undefined && query.filterValue !== undefined) {
    request.filter = { column: query.filterColumn, contains: query.filterValue };
  }
  return request;
}

function failureBody(status: OperationFailure | PartialFailure<{ botId: number }>) {
  return {
    error: status.message,
    kind: status.kind,
    ...(status.fields ? { fields: status.fields } : {}),
    ...("botId" in status ? { botId: status.botId } : {}),
  };
}

/** Read and validate a `{ values, knowledgeIds? }` body. Returns an error message when it is unusable. */
async function readRecordBody(readJson: () => Promise<unknown>): Promise<RecordBody | string> {
  let body: unknown;
  try {
    body = await readJson();
  } catch {
    return "Invalid JSON body";
  }
  const parsed = recordBodySchema.safeParse(body);
  if (!parsed.success) {
    return `Invalid request body: ${parsed.error.issues.map((issue) => issue.path.join(".") || "body").join(", ")}`;
  }
  return parsed.data;
}

/** Factory for tests -- inject a console service over an in-memory store. */
export function createTableRoutes(service: ConsoleService): Hono {
  return buildRoutes(() => service);
}

function buildRoutes(serviceFactory: () => ConsoleService): Hono {
  const routes = new Hono();

  // GET /tables/:table -- view a table
  routes.get("/tables/:table", async (c) => {
    const query = viewQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: "Invalid view query", kind: "validation_error" }, 400);
    }
    const status = await serviceFactory().viewTable(c.req.param("table"), toViewRequest(query.data));
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json(status.view);
  });

  // POST /tables/:table -- add a record (Bots may carry knowledgeIds to link)
  routes.post("/tables/:table", async (c) => {
    const body = await readRecordBody(() => c.req.json());
    if (typeof body === "string") return c.json({ error: body, kind: "validation_error" }, 400);

    const status = await serviceFactory().addRecord(c.req.param("table"), body.values, body.knowledgeIds ?? []);
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json(status, 201);
  });

  // PATCH /tables/:table/:identifier -- update the record the identifier picks
  routes.patch("/tables/:table/:identifier", async (c) => {
    const body = await readRecordBody(() => c.req.json());
    if (typeof body === "string") return c.json({ error: body, kind: "validation_error" }, 400);

    const status = await serviceFactory().updateRecord(
      c.req.param("table"),
      c.req.param("identifier"),
      body.values,
      body.knowledgeIds,
    );
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json(status);
  });

  // DELETE /tables/:table/:identifier -- delete a record and its links
  routes.delete("/tables/:table/:identifier", async (c) => {
    const status = await serviceFactory().deleteRecord(c.req.param("table"), c.req.param("identifier"));
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json(status);
  });

  // GET /bots/:botId/knowledge -- knowledge entries linked to a bot
  routes.get("/bots/:botId/knowledge", async (c) => {
    const status = await serviceFactory().linkedKnowledge(Number(c.req.param("botId")));
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json({ botId: status.botId, knowledgeIds: status.knowledgeIds });
  });

  // GET /knowledge-options -- choices for the bot form's multi-select
  routes.get("/knowledge-options", async (c) => {
    const status = await serviceFactory().knowledgeOptions();
    if (!status.ok) return c.json(failureBody(status), HTTP_STATUS[status.kind]);
    return c.json({ options: status.options });
  });

  return routes;
}

/** Pre-built console routes over the configured store, opened on first request. */
export const tableRoutes = buildRoutes(getConsoleService);
