import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger, NOOP_LOGGER } from "../logger.ts";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and passes metadata", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger("codec");
    logger.warn("first");
    logger.warn("second", { field: "a" });
    expect(warn.mock.calls).toEqual([
      ["[codec] first", ""],
      ["[codec] second", { field: "a" }],
    ]);
  });

  it("drops messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger("codec", "error");
    logger.debug("hidden");
    logger.error("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[codec] shown", "");
  });

  it("logs debug messages when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createConsoleLogger("codec", "debug").debug("details");
    expect(debug).toHaveBeenCalledWith("[codec] details", "");
  });

  it("offers a logger that does nothing", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    NOOP_LOGGER.info("nothing");
    expect(info).not.toHaveBeenCalled();
  });
});
