import { afterEach, describe, it, expect, vi } from "vitest";
import { createConsoleLogger } from "./logger.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  it("prefixes messages and routes them by level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new Error("test failure");

    const logger = createConsoleLogger({ level: "info" });
    logger.info("Turn 1-White: e2 to e4");
    logger.warn("careful");
    logger.error("broken", failure);

    expect(log).toHaveBeenCalledWith("[chess-engine] Turn 1-White: e2 to e4");
    expect(warn).toHaveBeenCalledWith("[chess-engine] careful");
    expect(error).toHaveBeenCalledWith("[chess-engine] broken", failure);
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger({ level: "warn", prefix: "[test]" });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[test] shown");
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger({ level: "silent" }).error("nothing");
    expect(error).not.toHaveBeenCalled();
  });
});
