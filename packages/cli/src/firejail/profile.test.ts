// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  createProfile,
  formatTimeout,
  PATH_LIST_FLAGS,
  PRIVATE_LIST_FLAGS,
  SCALAR_FLAGS,
  SWITCH_FLAGS,
} from "./profile.js";

describe("createProfile", () => {
  it("starts with nothing requested", () => {
    const profile = createProfile();

    expect(profile.verbose).toBe(false);
    expect(profile.switches.size).toBe(0);
    expect(profile.scalars).toEqual({});
    expect(profile.capsDrop).toEqual({ kind: "notSpecified" });
    expect(profile.net).toEqual({ kind: "notSpecified" });
    expect(profile.binds).toEqual([]);
    expect(profile.pathLists).toEqual({});
  });

  it("returns independent records", () => {
    const first = createProfile();
    first.blacklists.push("/mnt");

    expect(createProfile().blacklists).toEqual([]);
  });
});

function expectUnique(table: readonly (readonly [string, string])[]): void {
  const names = table.map(([name]) => name);
  const flags = table.map(([, flag]) => flag);

  expect(new Set(names).size).toBe(names.length);
  expect(new Set(flags).size).toBe(flags.length);
}

describe("flag tables", () => {
  it("has unique names and flags in every table", () => {
    expectUnique(SWITCH_FLAGS);
    expectUnique(SCALAR_FLAGS);
    expectUnique(PRIVATE_LIST_FLAGS);
    expectUnique(PATH_LIST_FLAGS);
  });

  it("starts the switch table with caps", () => {
    expect(SWITCH_FLAGS[0]).toEqual(["caps", "--caps"]);
  });
});

describe("formatTimeout", () => {
  it.each([
    [0, "00:00:00"],
    [59, "00:00:59"],
    [3725, "01:02:05"],
    [86400, "24:00:00"],
    [360000, "100:00:00"],
  ])("formats %d seconds as %s", (seconds, expected) => {
    expect(formatTimeout(seconds)).toBe(expected);
  });

  it("drops fractions and clamps negatives", () => {
    expect(formatTimeout(61.9)).toBe("00:01:01");
    expect(formatTimeout(-5)).toBe("00:00:00");
  });

  it.each([NaN, Infinity, -Infinity])("renders %s as zero", value => {
    expect(formatTimeout(value)).toBe("00:00:00");
  });
});
