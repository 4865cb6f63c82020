import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, silentLogger } from "./logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with level and component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger("Stabilizer");
    logger.info("ready");
    logger.warn("slow frame", 42);

    expect(log).toHaveBeenCalledWith("[INFO] [Stabilizer] ready");
    expect(warn).toHaveBeenCalledWith("[WARN] [Stabilizer] slow frame", 42);
  });

  it("routes info to stderr when stdout carries data", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createConsoleLogger("Replay", { stderrOnly: true }).info("started");

    expect(error).toHaveBeenCalledWith("[INFO] [Replay] started");
    expect(log).not.toHaveBeenCalled();
  });
});

describe("silentLogger", () => {
  it("writes nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    silentLogger.info("hidden");
    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});
