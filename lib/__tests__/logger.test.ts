import { describe, expect, it, vi } from "vitest";
import { createLogger } from "@/lib/logger";

function fakeConsole() {
  return { log: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const sink = fakeConsole();
    const logger = createLogger("warn", sink);
    logger.info("answered 2/2");
    logger.debug("loaded 2 entries");
    logger.warn("score file missing");
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledWith("warning: score file missing");
  });

  it("prints info to stdout and the message of an error", () => {
    const sink = fakeConsole();
    const logger = createLogger("debug", sink);
    logger.info("answered 1/2");
    logger.error("vocab-drill failed:", new Error("disk full"));
    logger.debug("saved");
    expect(sink.log).toHaveBeenCalledWith("answered 1/2");
    expect(sink.error).toHaveBeenNthCalledWith(1, "vocab-drill failed:", "disk full");
    expect(sink.error).toHaveBeenNthCalledWith(2, "[debug] saved");
  });

  it("stays quiet when silent", () => {
    const sink = fakeConsole();
    createLogger("silent", sink).error("boom");
    expect(sink.error).not.toHaveBeenCalled();
  });
});
