import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("is silent under test", () => {
    expect(createLogger("debug").level).toBe("silent");
  });

  it("uses the requested level outside tests", () => {
    vi.stubEnv("NODE_ENV", "production");
    expect(createLogger("warn").level).toBe("warn");
  });

  it("defaults to info without reading LOG_LEVEL", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("LOG_LEVEL", "loud");
    expect(createLogger().level).toBe("info");
  });
});
