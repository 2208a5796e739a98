import { describe, expect, it } from "vitest";

import { ParseError } from "./errors.js";
import { flagId } from "./ids.js";
import { mergeProject, parseRepository, repositoryUrl, type Project } from "./project.js";
import { Setting } from "./setting.js";

describe("parseRepository", () => {
  it("splits organisation and name", () => {
    expect(parseRepository("seL4/sel4test-manifest")).toEqual({
      organisation: "seL4",
      name: "sel4test-manifest",
    });
  });

  it.each(["sel4test", "a/b/c", "/name", "org/"])("rejects %j", (input) => {
    expect(() => parseRepository(input)).toThrow(ParseError);
  });

  it("rejects a trailing .git", () => {
    expect(() => parseRepository("seL4/sel4test.git")).toThrow(
      'Invalid repository "seL4/sel4test.git": name must not end in .git',
    );
  });
});

describe("repositoryUrl", () => {
  it("joins the git server and repository", () => {
    const repo = parseRepository("seL4/sel4test-manifest");

    expect(repositoryUrl("https://github.com", repo)).toBe(
      "https://github.com/seL4/sel4test-manifest.git",
    );
    expect(repositoryUrl("https://git.example.org//", repo)).toBe(
      "https://git.example.org/seL4/sel4test-manifest.git",
    );
  });
});

describe("mergeProject", () => {
  it("overrides scalars, unions the command line and merges settings", () => {
    const base: Project = {
      repository: parseRepository("seL4/sel4test-manifest"),
      rootServer: "sel4test-driver",
      commandLine: [flagId("smp")],
      setting: Setting.empty().setBool(flagId("release"), false),
    };
    const next: Project = {
      exitPhrase: "All is well",
      commandLine: [flagId("mcs"), flagId("smp")],
      setting: Setting.empty().setBool(flagId("release"), true),
    };

    const merged = mergeProject(base, next);

    expect(merged.repository).toEqual({ organisation: "seL4", name: "sel4test-manifest" });
    expect(merged.rootServer).toBe("sel4test-driver");
    expect(merged.exitPhrase).toBe("All is well");
    expect(merged.commandLine).toEqual(["mcs", "smp"]);
    expect(merged.setting.toRecord()).toEqual({ release: true });
  });
});
