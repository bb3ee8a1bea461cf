// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  FileSystemError,
  LaunchError,
  ValidationError,
} from "../../utils/errors.js";

import {
  analyzeError,
  exitCodeFor,
  getErrorMessage,
} from "./error-analysis.js";

describe("analyzeError", () => {
  it("categorizes FileSystemError and adds read advice", () => {
    const analyzed = analyzeError(
      new FileSystemError(
        "Cannot read jail profile /tmp/p.yaml",
        "read",
        "/tmp/p.yaml"
      )
    );

    expect(analyzed.category).toBe("filesystem");
    expect(analyzed.userMessage).toBe("Cannot read jail profile /tmp/p.yaml");
    expect(analyzed.suggestions).toContain(
      "Ensure the file exists and is readable"
    );
  });

  it("suggests installing firejail when the launcher is missing", () => {
    const cause = Object.assign(new Error("spawn firejail ENOENT"), {
      code: "ENOENT",
    });
    const analyzed = analyzeError(
      new LaunchError(
        "Failed to start firejail: spawn firejail ENOENT",
        "firejail",
        cause
      )
    );

    expect(analyzed).toEqual({
      category: "process",
      userMessage: "Failed to start firejail: spawn firejail ENOENT",
      technicalMessage:
        "Failed to start firejail: spawn firejail ENOENT (ENOENT)",
      suggestions: [
        "Install firejail, or point --launcher at it (tried: firejail)",
        "Check that the launcher is on your PATH",
      ],
    });
  });

  it("points at the redirection when a stdio file cannot be opened", () => {
    const cause = Object.assign(new Error("ENOENT: no such file"), {
      code: "ENOENT",
    });
    const analyzed = analyzeError(
      new LaunchError(
        "Cannot open /srv/out.log for stdout: ENOENT: no such file",
        "firejail",
        cause,
        "stdout"
      )
    );

    expect(analyzed.suggestions).toEqual([
      "Check the stdout redirection: it must name a path in a writable directory",
    ]);
  });

  it("lists validation problems as suggestions", () => {
    const analyzed = analyzeError(
      new ValidationError("Jail profile validation failed: /version: bad", [
        "/version: bad",
      ])
    );

    expect(analyzed.category).toBe("validation");
    expect(analyzed.suggestions).toEqual([
      "Check your jail profile against `jailrun schema`",
      "- /version: bad",
    ]);
  });

  it("gives a specific hint for unsupported profile formats", () => {
    const analyzed = analyzeError(
      new ConfigurationError("Unsupported file format: .ini")
    );

    expect(analyzed.category).toBe("configuration");
    expect(analyzed.suggestions).toEqual([
      "Rename the profile to .json, .yaml, .yml or .toml",
    ]);
  });

  it("recognizes foreign permission errors", () => {
    const analyzed = analyzeError(new Error("EACCES: permission denied"));

    expect(analyzed.category).toBe("filesystem");
    expect(analyzed.userMessage).toBe(
      "Permission denied accessing files or directories"
    );
    expect(analyzed.technicalMessage).toBe("EACCES: permission denied");
  });

  it("falls back to unknown for anything else", () => {
    expect(analyzeError("something odd")).toEqual({
      category: "unknown",
      userMessage: "something odd",
      technicalMessage: "something odd",
      suggestions: ["Run with --log-level debug for more information"],
    });
  });
});

describe("getErrorMessage", () => {
  it("handles errors, strings and other values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("plain")).toBe("plain");
    expect(getErrorMessage(42)).toBe("42");
  });
});

describe("exitCodeFor", () => {
  const launchError = (code: string, stream?: "stdin") =>
    new LaunchError(
      "Failed to start firejail",
      "firejail",
      Object.assign(new Error(code), { code }),
      stream
    );

  it("uses shell exit codes for a missing or non-executable launcher", () => {
    expect(exitCodeFor(launchError("ENOENT"))).toBe(127);
    expect(exitCodeFor(launchError("EACCES"))).toBe(126);
  });

  it("exits 1 for a failed redirection and for other errors", () => {
    expect(exitCodeFor(launchError("ENOENT", "stdin"))).toBe(1);
    expect(exitCodeFor(launchError("EPERM"))).toBe(1);
    expect(exitCodeFor(new Error("boom"))).toBe(1);
  });
});
