import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, NullLogger } from "../src/logging/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("warn");

    logger.debug("hidden");
    logger.warn("shown %d", 1);

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[aoai-sim] shown %d", 1);
  });

  it("defaults to info with a custom prefix", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger(undefined, "[test]");

    logger.info("listening on %s", "127.0.0.1:8000");
    logger.error("boom");

    expect(info).toHaveBeenCalledWith("[test] listening on %s", "127.0.0.1:8000");
    expect(error).toHaveBeenCalledWith("[test] boom");
  });
});

describe("NullLogger", () => {
  it("accepts the logger arguments and writes nothing", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new NullLogger();
    const spy = vi.spyOn(logger, "error");

    logger.error("failed to handle %s", "/foo");

    expect(spy.mock.calls[0]).toEqual(["failed to handle %s", "/foo"]);
    expect(error).not.toHaveBeenCalled();
  });
});
