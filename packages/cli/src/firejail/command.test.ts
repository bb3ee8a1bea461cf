// pattern: Mixed (unavoidable)
// Spawn plumbing is checked against a mocked execa; the emitted vector is pure

import { EventEmitter } from "node:events";
import { fileURLToPath } from "node:url";

import { beforeEach, describe, expect, it, vi } from "vitest";

import { LaunchError } from "../utils/errors.js";

import { CapsDrop } from "./caps-drop.js";
import { createFirejailCommand, FirejailCommand } from "./command.js";

import type { Logger } from "pino";

const execaMock = vi.hoisted(() => vi.fn());

vi.mock("execa", () => ({
  execa: execaMock,
}));

/**
 * Stand-in for an execa subprocess: an emitter that is also a thenable.
 * `outcome` is emitted on the next tick; the promise side settles with
 * `settle` when given, otherwise never.
 */
function fakeSubprocess(
  outcome: "spawn" | Error | undefined,
  settle?: object
): EventEmitter & PromiseLike<unknown> {
  const emitter = new EventEmitter();
  const result: Promise<unknown> = settle
    ? Promise.resolve(settle)
    : new Promise(() => undefined);
  const subprocess = Object.assign(emitter, {
    pid: 4321,
    then: result.then.bind(result),
  });

  if (outcome !== undefined) {
    process.nextTick(() => {
      if (outcome === "spawn") {
        subprocess.emit("spawn");
      } else {
        subprocess.emit("error", outcome);
      }
    });
  }
  return subprocess;
}

describe("FirejailCommand", () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  describe("launcherArgs", () => {
    it("builds the vector for a switch-only configuration", () => {
      const command = createFirejailCommand("env").caps().apparmor();

      expect(command.launcherArgs()).toEqual([
        "--quiet",
        "--caps",
        "--apparmor",
        "--",
        "env",
      ]);
    });

    it("returns this from every configuration method", () => {
      const command = new FirejailCommand("env");

      expect(command.caps()).toBe(command);
      expect(command.hostname("h")).toBe(command);
      expect(command.blacklist("/mnt")).toBe(command);
      expect(command.env("A", "1")).toBe(command);
      expect(command.stdout("pipe")).toBe(command);
    });

    it("does not include process settings in the vector", () => {
      const command = createFirejailCommand("env")
        .env("A", "1")
        .envClear()
        .currentDir("/tmp")
        .launcherPath("/usr/local/bin/firejail");

      expect(command.launcherArgs()).toEqual(["--quiet", "--", "env"]);
      expect(command.getLauncher()).toBe("/usr/local/bin/firejail");
    });
  });

  describe("spawn", () => {
    it("passes the launcher, vector and default stdio to execa", async () => {
      execaMock.mockReturnValue(fakeSubprocess("spawn"));

      const spawned = await createFirejailCommand("env")
        .caps()
        .apparmor()
        .spawn();

      expect(execaMock).toHaveBeenCalledTimes(1);
      expect(execaMock).toHaveBeenCalledWith(
        "firejail",
        ["--quiet", "--caps", "--apparmor", "--", "env"],
        expect.objectContaining({
          extendEnv: false,
          reject: false,
          buffer: false,
          stdin: "inherit",
          stdout: "inherit",
          stderr: "inherit",
        })
      );
      expect(spawned.launcher).toBe("firejail");
      expect(spawned.args).toEqual([
        "--quiet",
        "--caps",
        "--apparmor",
        "--",
        "env",
      ]);
      expect(spawned.pid).toBe(4321);
    });

    it("applies launcher path, working directory and stdio settings", async () => {
      execaMock.mockReturnValue(fakeSubprocess("spawn"));
      const input = fileURLToPath(import.meta.url);

      await createFirejailCommand("cat")
        .launcherPath("/opt/firejail/bin/firejail")
        .currentDir("/srv/work")
        .stdin({ file: input })
        .stdout("pipe")
        .stderr("ignore")
        .spawn();

      expect(execaMock).toHaveBeenCalledWith(
        "/opt/firejail/bin/firejail",
        ["--quiet", "--", "cat"],
        expect.objectContaining({
          cwd: "/srv/work",
          stdin: { file: input },
          stdout: "pipe",
          stderr: "ignore",
        })
      );
    });

    it("passes the resolved environment", async () => {
      execaMock.mockReturnValue(fakeSubprocess("spawn"));

      await createFirejailCommand("env")
        .envClear()
        .env("LANG", "C")
        .envs({ A: "1", B: "2" })
        .envRemove("B")
        .spawn();

      expect(execaMock).toHaveBeenCalledWith(
        "firejail",
        ["--quiet", "--", "env"],
        expect.objectContaining({ env: { LANG: "C", A: "1" } })
      );
    });

    it("refuses to spawn the same command twice", async () => {
      execaMock.mockReturnValue(fakeSubprocess("spawn"));
      const command = createFirejailCommand("env");

      await command.spawn();

      await expect(command.spawn()).rejects.toThrow(
        "Command for env has already been spawned"
      );
      expect(execaMock).toHaveBeenCalledTimes(1);
    });

    it("wraps a start failure in LaunchError", async () => {
      const cause = Object.assign(new Error("spawn firejail ENOENT"), {
        code: "ENOENT",
      });
      execaMock.mockReturnValue(fakeSubprocess(cause));

      const error: unknown = await createFirejailCommand("env")
        .spawn()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LaunchError);
      if (error instanceof LaunchError) {
        expect(error.message).toBe(
          "Failed to start firejail: spawn firejail ENOENT"
        );
        expect(error.code).toBe("ENOENT");
        expect(error.launcher).toBe("firejail");
        expect(error.cause).toBe(cause);
      }
    });

    it("keeps the settled error when the subprocess fails before starting", async () => {
      const settled = Object.assign(
        new Error("Command failed with ENOENT: firejail --quiet -- env"),
        { failed: true, code: "ENOENT" }
      );
      execaMock.mockReturnValue(fakeSubprocess(undefined, settled));

      const error: unknown = await createFirejailCommand("env")
        .spawn()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LaunchError);
      if (error instanceof LaunchError) {
        expect(error.message).toBe(
          "Failed to start firejail: Command failed with ENOENT: firejail --quiet -- env"
        );
        expect(error.code).toBe("ENOENT");
        expect(error.cause).toBe(settled);
      }
    });

    it("fails when the subprocess settles without an error or a process", async () => {
      execaMock.mockReturnValue(fakeSubprocess(undefined, { failed: false }));

      await expect(createFirejailCommand("env").spawn()).rejects.toThrow(
        "Failed to start firejail: no process was created"
      );
    });

    it("does not call execa when a redirected file cannot be opened", async () => {
      const error: unknown = await createFirejailCommand("env")
        .stdin({ file: "/nonexistent/jailrun-dir/in" })
        .spawn()
        .catch((e: unknown) => e);

      expect(execaMock).not.toHaveBeenCalled();
      expect(error).toBeInstanceOf(LaunchError);
      if (error instanceof LaunchError) {
        expect(error.code).toBe("ENOENT");
        expect(error.launcher).toBe("firejail");
        expect(error.stream).toBe("stdin");
      }
    });

    it("checks that an output file's directory exists", async () => {
      const error: unknown = await createFirejailCommand("env")
        .stderr({ file: "/nonexistent/jailrun-dir/err.log" })
        .spawn()
        .catch((e: unknown) => e);

      expect(execaMock).not.toHaveBeenCalled();
      expect(error).toBeInstanceOf(LaunchError);
      if (error instanceof LaunchError) {
        expect(error.code).toBe("ENOENT");
        expect(error.stream).toBe("stderr");
        expect(error.message).toBe(
          "Cannot open /nonexistent/jailrun-dir/err.log for stderr: ENOENT: no such file or directory, access '/nonexistent/jailrun-dir'"
        );
      }
    });

    it("logs a capability drop configured without caps", async () => {
      execaMock.mockReturnValue(fakeSubprocess("spawn"));
      const logger = {
        debug: vi.fn(),
        child: vi.fn().mockReturnThis(),
      } as unknown as Logger;

      await createFirejailCommand("/usr/bin/env", logger)
        .capsDrop(CapsDrop.dropAll())
        .spawn();

      expect(logger.child).toHaveBeenCalledWith({ process: "env" });
      expect(logger.debug).toHaveBeenCalledWith(
        { capsDrop: "dropAll" },
        "Capability drop configured without caps(), not passing it to firejail"
      );
    });
  });
});
