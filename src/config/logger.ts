import winston from "winston";
import { config } from "./index.js";

/**
 * Shared service logger.
 *
 * JSON lines on stdout with a timestamp and error stacks. Silent under test so
 * suites that do not mock it stay quiet.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "labelhook" },
  transports: [new winston.transports.Console()],
});

/** Shorten a container or image id for log lines. */
export function shortId(id: string): string {
  if (id.length > 16) return `${id.slice(0, 15)}-`;
  return id;
}
