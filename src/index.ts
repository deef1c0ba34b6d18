import { serve } from "@hono/node-server";
import Docker from "dockerode";
import { createApp } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { ENV_SECRET_PREFIX, loadCredentials } from "./credentials/credential-store.js";
import { ContainerOrchestrator } from "./orchestrator/container-orchestrator.js";
import { DockerRuntimeClient } from "./runtime/docker-runtime-client.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  // Don't exit — log and keep serving webhooks
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Uncaught exceptions leave the process in an undefined state.
  process.exit(1);
};

async function main(): Promise<void> {
  const credentials = loadCredentials(process.env);
  if (credentials.size === 0) {
    logger.error(`No secrets found. Set them with ${ENV_SECRET_PREFIX}<name>=<secret>`);
    process.exit(1);
  }

  logger.info("Connecting to Docker");
  const runtime = new DockerRuntimeClient(
    config.dockerSocketPath ? new Docker({ socketPath: config.dockerSocketPath }) : new Docker(),
  );
  try {
    await runtime.ping();
  } catch (err) {
    logger.error("Connection to Docker failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }

  const orchestrator = new ContainerOrchestrator(runtime, credentials, {
    labelKey: config.labelKey,
    stopTimeoutSeconds: config.stopTimeoutSeconds,
  });
  const app = createApp({ orchestrator, runtime });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`labelhook listening on port ${info.port}`, { webhooks: credentials.names() });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down web server`);
    const force = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, config.shutdownTimeoutMs);
    force.unref();

    server.close((err) => {
      if (err) {
        logger.error("Cannot shut down web server", { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  main().catch((err: unknown) => {
    logger.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}
