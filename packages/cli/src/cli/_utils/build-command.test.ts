// pattern: Imperative Shell
import { mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { initializeLogger, setCliLogLevel } from "../../logger/index.js";

import { buildCommandFromOptions, formatVector } from "./build-command.js";

describe("buildCommandFromOptions", () => {
  let testDir: string;

  beforeAll(() => {
    initializeLogger("json", true);
    setCliLogLevel("error");
  });

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `jailrun-test-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("formats the launcher and vector one entry per line", async () => {
    const command = await buildCommandFromOptions("ls", ["-la"], {
      launcher: "/usr/bin/firejail",
    });

    expect(formatVector(command)).toBe("/usr/bin/firejail\n--quiet\n--\nls\n-la");
  });

  it("applies a profile file", async () => {
    const profileFile = join(testDir, "profile.yaml");
    await writeFile(profileFile, "version: 1\nenable: [noRoot]\n");

    const command = await buildCommandFromOptions("ls", [], {
      profileFile,
      launcher: "firejail",
    });

    expect(command.launcherArgs()).toEqual(["--quiet", "--noroot", "--", "ls"]);
  });
});
