import { Hono } from "hono";
import type { ContainerRuntimeClient } from "../../runtime/types.js";

/**
 * Liveness plus a runtime reachability probe. Public, unauthenticated.
 * Mounted ahead of the webhook routes, so `GET /health` never reaches a group named "health"; other methods still do.
 */
export function createHealthRoutes(runtime: ContainerRuntimeClient): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    const health: { status: string; service: string; runtime: "reachable" | "unreachable" } = {
      status: "ok",
      service: "labelhook",
      runtime: "reachable",
    };

    try {
      await runtime.ping();
    } catch {
      health.status = "degraded";
      health.runtime = "unreachable";
      return c.json(health, 503);
    }

    return c.json(health);
  });

  return routes;
}
