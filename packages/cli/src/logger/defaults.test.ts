// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { resolveLogDefaults } from "./defaults.js";

describe("resolveLogDefaults", () => {
  it("uses info and the nice format on a terminal", () => {
    expect(resolveLogDefaults({}, true)).toEqual({
      level: "info",
      format: "nice",
      nonInteractive: false,
    });
  });

  it("switches to json when stderr is not a terminal", () => {
    expect(resolveLogDefaults({}, false)).toEqual({
      level: "info",
      format: "json",
      nonInteractive: true,
    });
  });

  it("reads the level, format and interactivity from the environment", () => {
    expect(
      resolveLogDefaults(
        {
          JAILRUN_LOG_LEVEL: "debug",
          JAILRUN_LOG_FORMAT: "nice",
          JAILRUN_NON_INTERACTIVE: "1",
        },
        true
      )
    ).toEqual({ level: "debug", format: "nice", nonInteractive: true });
  });

  it("ignores values it does not know", () => {
    expect(
      resolveLogDefaults(
        { JAILRUN_LOG_LEVEL: "loud", JAILRUN_LOG_FORMAT: "xml" },
        true
      )
    ).toEqual({ level: "info", format: "nice", nonInteractive: false });
  });
});
