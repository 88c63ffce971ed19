import { z } from "zod";

export const DEFAULT_DATABASE_PATH = "./data/bots.sqlite";
export const DEFAULT_READ_CACHE_TTL_MS = 60_000;

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** SQLite store backing the three console tables. */
  database: z
    .object({
      /** File path, or ":memory:" for a throwaway store. */
      path: z.string().min(1).default(DEFAULT_DATABASE_PATH),
    })
    .default({ path: DEFAULT_DATABASE_PATH }),

  /** Read-cache window for table listings. Writes always invalidate it. */
  readCache: z
    .object({
      ttlMs: z.coerce.number().int().min(0).default(DEFAULT_READ_CACHE_TTL_MS),
    })
    .default({ ttlMs: DEFAULT_READ_CACHE_TTL_MS }),

  /** Values pre-filled when a bot is created without them. */
  botDefaults: z
    .object({
      owner: z.string().min(1).default("Platform Operations"),
    })
    .default({ owner: "Platform Operations" }),
});

export type Config = z.infer<typeof configSchema>;

/** Parse configuration from an environment map. Exported for tests. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    database: {
      path: env.DATABASE_PATH,
    },
    readCache: {
      ttlMs: env.READ_CACHE_TTL_MS,
    },
    botDefaults: {
      owner: env.BOT_DEFAULT_OWNER,
    },
  });
}

export const config = loadConfig(process.env);
