import type { ErrorHandler } from "hono";
import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { ContainerOrchestrator } from "../orchestrator/container-orchestrator.js";
import type { ContainerRuntimeClient } from "../runtime/types.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWebhookRoutes } from "./routes/webhook.js";

export interface AppDeps {
  orchestrator: ContainerOrchestrator;
  runtime: ContainerRuntimeClient;
}

// Global error handler — catches everything the routes do not map themselves.
export const errorHandler: ErrorHandler = (err, c) => {
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

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes(deps.runtime));
  app.route("/", createWebhookRoutes(deps.orchestrator));

  app.onError(errorHandler);
  return app;
}
