import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  inferSourceDirectory,
  parseEasySettings,
  readEasySettings,
  variableToFlagName,
} from "./easy-settings.js";
import { flagId } from "./ids.js";

const EASY_SETTINGS = `
# Project-level build options
set(KernelARMPlatform "" CACHE STRING "ARM platform to build for")
set(RELEASE OFF CACHE BOOL "Performance optimized build")
  set(SIMULATION OFF CACHE BOOL "Build for a simulator")
set(PLATFORM "x86_64" CACHE STRING "Platform")
set(LibSel4TestPrinterRegex "Test one" CACHE STRING "Only run matching tests")
set(NotACacheEntry ON)
`;

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "s4-easy-settings-"));
  tempDirs.push(dir);
  return dir;
}

describe("variableToFlagName", () => {
  it("lowercases screaming snake case", () => {
    expect(variableToFlagName("SIMULATION")).toBe("simulation");
    expect(variableToFlagName("ARM_HYP")).toBe("arm-hyp");
  });

  it("splits pascal case before every capital", () => {
    expect(variableToFlagName("KernelMCS")).toBe("kernel-m-c-s");
    expect(variableToFlagName("KernelARMPlatform")).toBe("kernel-a-r-m-platform");
  });
});

describe("parseEasySettings", () => {
  it("reads cached settings with their type and description", () => {
    const flags = parseEasySettings(EASY_SETTINGS);

    expect([...flags.keys()]).toEqual([
      "kernel-a-r-m-platform",
      "release",
      "simulation",
      "platform",
    ]);
    expect(flags.get(flagId("release"))).toEqual({
      description: "Performance optimized build",
      variable: "RELEASE",
      type: "boolean",
      requires: [],
    });
    expect(flags.get(flagId("kernel-a-r-m-platform"))?.type).toBe("string");
    expect(flags.get(flagId("platform"))?.variable).toBe("PLATFORM");
  });

  it("skips defaults that contain spaces and non-cache lines", () => {
    const flags = parseEasySettings(EASY_SETTINGS);

    expect(flags.has(flagId("lib-sel4-test-printer-regex"))).toBe(false);
    expect(flags.has(flagId("not-a-cache-entry"))).toBe(false);
  });
});

describe("readEasySettings", () => {
  it("returns nothing when the workspace has no easy-settings file", async () => {
    expect((await readEasySettings(makeTempDir())).size).toBe(0);
  });

  it("reads the file at the workspace root", async () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "easy-settings.cmake"), EASY_SETTINGS);

    expect((await readEasySettings(root)).has(flagId("simulation"))).toBe(true);
  });
});

describe("inferSourceDirectory", () => {
  it("is undefined without an easy-settings file", async () => {
    expect(await inferSourceDirectory(makeTempDir())).toBeUndefined();
  });

  it("resolves a plain file to the workspace root itself", async () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "easy-settings.cmake"), "");

    expect(await inferSourceDirectory(root)).toBe(".");
  });
});
