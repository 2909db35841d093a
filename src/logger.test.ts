import { afterEach, describe, expect, it, vi } from "vitest";

import { ConsoleLogger, NullLogger } from "./logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = new ConsoleLogger("warn");
    logger.info("hidden");
    logger.warn("shown", { count: 2 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] shown", { count: 2 });
  });

  it("prints nothing at all when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    new ConsoleLogger("silent").error("nope");

    expect(error).not.toHaveBeenCalled();
  });

  it("passes an empty string when there is no metadata", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    new ConsoleLogger("debug").debug("details");

    expect(debug).toHaveBeenCalledWith("[DEBUG] details", "");
  });
});

describe("NullLogger", () => {
  it("accepts every call", () => {
    const logger = new NullLogger();
    expect(() => {
      logger.debug("a");
      logger.info("b");
      logger.warn("c");
      logger.error("d");
    }).not.toThrow();
  });
});
