import { sql } from "drizzle-orm";
import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { getStorage } from "../console/services.js";
import { createHealthRoutes } from "./routes/health.js";
import { tableRoutes } from "./routes/tables.js";

export const app = new Hono();

app.use("/*", secureHeaders());

app.route(
  "/health",
  createHealthRoutes(() => ({
    ping: () => {
      getStorage().withConnection("health check", (db) => db.get(sql`SELECT 1`));
    },
  })),
);
app.route("/api", tableRoutes);

// Global error handler: anything a route throws ends here as a generic 500.
export const errorHandler: Parameters<typeof app.onError>[0] = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

app.onError(errorHandler);

app.notFound((c) => c.json({ error: "Not found", path: c.req.path }, 404));
