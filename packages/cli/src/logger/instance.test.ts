// pattern: Imperative Shell

import { afterEach, describe, expect, it, vi } from "vitest";

describe("CLI_LOGGER", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("configures itself from the environment when not initialized", async () => {
    vi.stubEnv("JAILRUN_LOG_LEVEL", "warn");
    vi.stubEnv("JAILRUN_LOG_FORMAT", "json");
    vi.resetModules();

    const { CLI_LOGGER } = await import("./instance.js");

    expect(CLI_LOGGER.level).toBe("warn");
    expect(CLI_LOGGER.isLevelEnabled("info")).toBe(false);
  });

  it("follows a later initializeLogger and setCliLogLevel", async () => {
    vi.stubEnv("JAILRUN_LOG_LEVEL", "warn");
    vi.resetModules();

    const { CLI_LOGGER, initializeLogger, setCliLogLevel } = await import(
      "./instance.js"
    );
    expect(CLI_LOGGER.level).toBe("warn");

    initializeLogger("json", true);
    expect(CLI_LOGGER.level).toBe("info");

    setCliLogLevel("trace");
    expect(CLI_LOGGER.level).toBe("trace");
  });
});
