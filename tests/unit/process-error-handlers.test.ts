import { afterEach, describe, expect, it, vi } from "vitest";
import { logger } from "../../src/config/logger.js";
import { uncaughtExceptionHandler, unhandledRejectionHandler } from "../../src/index.js";

vi.mock("../../src/config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
  shortId: (id: string) => id,
}));

describe("Process-level error handlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(logger.error).mockClear();
  });

  it("are not registered when the module is imported under test", () => {
    expect(process.listeners("unhandledRejection")).not.toContain(unhandledRejectionHandler);
    expect(process.listeners("uncaughtException")).not.toContain(uncaughtExceptionHandler);
  });

  it("unhandledRejection handler logs but does not exit", () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
    const reason = new Error("late failure");

    unhandledRejectionHandler(reason, Promise.resolve());

    expect(logger.error).toHaveBeenCalledWith(
      "Unhandled promise rejection",
      expect.objectContaining({ reason: "late failure", stack: reason.stack }),
    );
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("unhandledRejection handler stringifies non-Error reasons", () => {
    unhandledRejectionHandler("plain string", Promise.resolve());

    expect(logger.error).toHaveBeenCalledWith(
      "Unhandled promise rejection",
      expect.objectContaining({ reason: "plain string", stack: undefined }),
    );
  });

  it("uncaughtException handler logs and exits with code 1", () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);

    uncaughtExceptionHandler(new Error("crash"), "uncaughtException");

    expect(logger.error).toHaveBeenCalledWith(
      "Uncaught exception",
      expect.objectContaining({ error: "crash", origin: "uncaughtException" }),
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
