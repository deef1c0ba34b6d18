import type { Context } from "hono";
import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import { AuthenticationError } from "../../credentials/authenticate.js";
import type { ContainerOrchestrator } from "../../orchestrator/container-orchestrator.js";
import type { ContainerDescriptor } from "../../runtime/types.js";
import { DiscoveryError } from "../../orchestrator/types.js";

/** Header that may carry the webhook secret. */
export const SECRET_HEADER = "X-Labelhook-Secret";

const AUTH_STATUS = {
  "not-found": { status: 404, error: "webhook not found" },
  missing: { status: 401, error: "secret not found" },
  mismatch: { status: 401, error: "secret mismatch" },
} as const;

/** Secret from the query string, the secret header, or the raw body, in that order. */
async function extractSecret(c: Context): Promise<string | undefined> {
  const fromQuery = c.req.query("secret");
  if (fromQuery) return fromQuery;
  const fromHeader = c.req.header(SECRET_HEADER);
  if (fromHeader) return fromHeader;
  const fromBody = await c.req.text();
  return fromBody || undefined;
}

/**
 * Webhook routes. Respond with the descriptors of the containers that were replaced.
 *
 * - ALL /:name           secret via ?secret=, X-Labelhook-Secret, or request body
 * - ALL /:name/:secret   secret in the path
 */
export function createWebhookRoutes(orchestrator: ContainerOrchestrator): Hono {
  const routes = new Hono();

  const trigger = async (c: Context, name: string, secret: string | undefined) => {
    try {
      const result = await orchestrator.process(name, secret);
      const updated: ContainerDescriptor[] = [];
      for (const outcome of result.outcomes) {
        if (outcome.status === "succeeded") updated.push(outcome.replacement);
      }
      return c.json(updated, 200);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        const { status, error } = AUTH_STATUS[err.kind];
        logger.warn(`Rejected webhook call for ${err.group}: ${error}`);
        return c.json({ error }, status);
      }
      if (err instanceof DiscoveryError) {
        logger.error(err.message);
        return c.json({ error: err.message }, 500);
      }
      throw err;
    }
  };

  routes.all("/:name", async (c) => {
    const secret = await extractSecret(c);
    if (!secret) {
      return c.json({ error: AUTH_STATUS.missing.error }, 401);
    }
    return trigger(c, c.req.param("name"), secret);
  });

  routes.all("/:name/:secret", (c) => trigger(c, c.req.param("name"), c.req.param("secret")));

  return routes;
}
