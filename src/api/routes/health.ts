import { Hono } from "hono";

export interface StoreProbe {
  /** Throws when the store cannot answer a trivial query. */
  ping(): void;
}

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes(probeFactory?: () => StoreProbe | null): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const health: { status: string; service: string; store?: "ok" | "unavailable" } = {
      status: "ok",
      service: "bot-knowledge-console",
    };

    const probe = probeFactory?.() ?? null;
    if (probe) {
      try {
        probe.ping();
        health.store = "ok";
      } catch {
        // Store unreachable; the endpoint still answers
        health.store = "unavailable";
        health.status = "degraded";
      }
    }

    return c.json(health);
  });

  return routes;
}
