import { z } from "zod";

/** Label a container sets to opt into one or more webhook groups. */
export const DEFAULT_LABEL_KEY = "io.d2a.yadwh.ug";

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(80),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Container label that carries the comma-separated group list. */
  labelKey: z.string().trim().min(1).default(DEFAULT_LABEL_KEY),

  /** Grace period handed to the runtime before it kills a stopping container. */
  stopTimeoutSeconds: z.coerce.number().int().min(0).default(60),

  /** Unix socket of the Docker daemon. Unset means dockerode's own default (honours DOCKER_HOST). */
  dockerSocketPath: z.string().min(1).optional(),

  /** How long shutdown waits for in-flight requests before forcing exit (ms). */
  shutdownTimeoutMs: z.coerce.number().int().min(0).default(10_000),
});

export type Config = z.infer<typeof configSchema>;

/** Parse service settings from an environment map. Credentials are loaded separately. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    labelKey: env.WEBHOOK_LABEL_KEY,
    stopTimeoutSeconds: env.STOP_TIMEOUT_SECONDS,
    dockerSocketPath: env.DOCKER_SOCKET_PATH || undefined,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
  });
}

export const config = parseConfig(process.env);
