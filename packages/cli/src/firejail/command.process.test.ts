// pattern: Imperative Shell
// Spawns real processes, using echo in place of firejail

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { text } from "node:stream/consumers";

import { describe, expect, it } from "vitest";

import { LaunchError } from "../utils/errors.js";

import { createFirejailCommand } from "./command.js";

describe("FirejailCommand spawning", () => {
  it("starts the launcher with the emitted vector", async () => {
    const { child, pid, args } = await createFirejailCommand("env")
      .caps()
      .apparmor()
      .launcherPath("echo")
      .stdout("pipe")
      .spawn();

    expect(pid).toBe(child.pid);
    expect(args).toEqual(["--quiet", "--caps", "--apparmor", "--", "env"]);

    const stdout = child.stdout;
    if (!stdout) {
      throw new Error("stdout was not piped");
    }
    const [output, result] = await Promise.all([text(stdout), child]);

    expect(output).toBe("--quiet --caps --apparmor -- env\n");
    expect(result.exitCode).toBe(0);
  });

  it("reports the exit code without rejecting", async () => {
    const { child } = await createFirejailCommand("env")
      .launcherPath("false")
      .spawn();

    const result = await child;
    expect(result.exitCode).toBe(1);
    expect(result.failed).toBe(true);
  });

  it("rejects with LaunchError when the launcher does not exist", async () => {
    const error: unknown = await createFirejailCommand("env")
      .launcherPath("/nonexistent/jailrun-test-launcher")
      .spawn()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LaunchError);
    if (error instanceof LaunchError) {
      expect(error.code).toBe("ENOENT");
      expect(error.launcher).toBe("/nonexistent/jailrun-test-launcher");
    }
  });

  it("rejects with LaunchError when the stdin file does not exist", async () => {
    const error: unknown = await createFirejailCommand("env")
      .launcherPath("echo")
      .stdin({ file: "/nonexistent/dir/in" })
      .spawn()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LaunchError);
    if (error instanceof LaunchError) {
      expect(error.code).toBe("ENOENT");
      expect(error.message).toBe(
        "Cannot open /nonexistent/dir/in for stdin: ENOENT: no such file or directory, access '/nonexistent/dir/in'"
      );
      expect(error.stream).toBe("stdin");
    }
  });

  it("redirects stdout to a file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "jailrun-"));
    try {
      const out = join(dir, "out.txt");
      const { child } = await createFirejailCommand("env")
        .launcherPath("echo")
        .stdout({ file: out })
        .spawn();
      await child;

      expect(await readFile(out, "utf8")).toBe("--quiet -- env\n");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
