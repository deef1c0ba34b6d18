import { describe, expect, it } from "vitest";
import { DEFAULT_LABEL_KEY, parseConfig } from "./index.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    expect(parseConfig({})).toEqual({
      port: 80,
      nodeEnv: "development",
      logLevel: "info",
      labelKey: DEFAULT_LABEL_KEY,
      stopTimeoutSeconds: 60,
      dockerSocketPath: undefined,
      shutdownTimeoutMs: 10_000,
    });
  });

  it("reads and coerces environment values", () => {
    const config = parseConfig({
      PORT: "8080",
      NODE_ENV: "production",
      LOG_LEVEL: "debug",
      WEBHOOK_LABEL_KEY: " com.example.deploy-group ",
      STOP_TIMEOUT_SECONDS: "15",
      DOCKER_SOCKET_PATH: "/run/user/1000/docker.sock",
      SHUTDOWN_TIMEOUT_MS: "2500",
    });

    expect(config).toEqual({
      port: 8080,
      nodeEnv: "production",
      logLevel: "debug",
      labelKey: "com.example.deploy-group",
      stopTimeoutSeconds: 15,
      dockerSocketPath: "/run/user/1000/docker.sock",
      shutdownTimeoutMs: 2500,
    });
  });

  it("treats an empty socket path as unset", () => {
    expect(parseConfig({ DOCKER_SOCKET_PATH: "" }).dockerSocketPath).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => parseConfig({ PORT: "not-a-port" })).toThrow();
    expect(() => parseConfig({ STOP_TIMEOUT_SECONDS: "-1" })).toThrow();
  });
});
