import { vi } from "vitest";

import type { ILogger } from "../logger.js";

export function spyLogger() {
  return {
    debug: vi.fn<ILogger["debug"]>(),
    info: vi.fn<ILogger["info"]>(),
    warn: vi.fn<ILogger["warn"]>(),
    error: vi.fn<ILogger["error"]>()
  } satisfies ILogger;
}
