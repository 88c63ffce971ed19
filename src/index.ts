import { serve } from "@hono/node-server";
import { app } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { closeConsoleServices, getStorage } from "./console/services.js";
import { validateRequiredEnvVars } from "./validate-env.js";

const port = config.port;

export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

if (process.env.NODE_ENV !== "test") {
  validateRequiredEnvVars();

  // Open the store and create missing tables before taking traffic.
  getStorage();

  const server = serve({ fetch: app.fetch, port }, () => {
    logger.info(`bot-knowledge-console listening on http://0.0.0.0:${port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      closeConsoleServices();
      process.exit(0);
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
