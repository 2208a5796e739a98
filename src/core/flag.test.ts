import { describe, expect, it } from "vitest";

import { InvalidValueError, UnsatisfiedRequirementError } from "./errors.js";
import { cmakeArgument, createFlag, mergeFlag, validateFlag, type RequirementSet } from "./flag.js";
import { flagId, type FlagId } from "./ids.js";
import { Setting } from "./setting.js";
import { FALSE, singleRequirement, textValue, TRUE, type Requirement } from "./value.js";

const f = flagId("f");
const x = flagId("x");
const y = flagId("y");

function requirements(entries: Array<[FlagId, Requirement]>): RequirementSet {
  return new Map(entries);
}

// f requires x=true, or y="a"
const dependent = createFlag("dependent flag", {
  requires: [
    requirements([[x, singleRequirement(TRUE)]]),
    requirements([[y, singleRequirement(textValue("a"))]]),
  ],
});

describe("validateFlag", () => {
  it("accepts true when the first conjunction holds", () => {
    const setting = Setting.empty().setBool(x, true);
    expect(() => validateFlag(f, dependent, setting, TRUE)).not.toThrow();
  });

  it("accepts true when a later conjunction holds", () => {
    const setting = Setting.empty().setText(y, "a");
    expect(() => validateFlag(f, dependent, setting, TRUE)).not.toThrow();
  });

  it("rejects true when no conjunction holds", () => {
    const setting = Setting.empty().setBool(x, false).setText(y, "b");

    expect(() => validateFlag(f, dependent, setting, TRUE)).toThrow(UnsatisfiedRequirementError);
    expect(() => validateFlag(f, dependent, setting, TRUE)).toThrow(
      "None of the requirement sets for the flag f could be satisfied",
    );
  });

  it("treats missing dependencies as false", () => {
    expect(() => validateFlag(f, dependent, Setting.empty(), TRUE)).toThrow(
      UnsatisfiedRequirementError,
    );
  });

  it("always accepts false", () => {
    expect(() => validateFlag(f, dependent, Setting.empty(), FALSE)).not.toThrow();
  });

  it("rejects text values on flags with requirements", () => {
    expect(() => validateFlag(f, dependent, Setting.empty(), textValue("on"))).toThrow(
      InvalidValueError,
    );
    expect(() => validateFlag(f, dependent, Setting.empty(), textValue("on"))).toThrow(
      'Cannot set flag f with requirements to non-boolean value "on"',
    );
  });

  it("accepts anything on unconstrained flags", () => {
    const free = createFlag("free");
    expect(() => validateFlag(f, free, Setting.empty(), textValue("anything"))).not.toThrow();
  });

  it("ignores conjunction order", () => {
    const reversed = createFlag("dependent flag", {
      requires: [...dependent.requires].reverse(),
    });
    const setting = Setting.empty().setText(y, "a");

    expect(() => validateFlag(f, reversed, setting, TRUE)).not.toThrow();
  });
});

describe("mergeFlag", () => {
  it("replaces the description and keeps unset optionals", () => {
    const base = createFlag("old", { variable: "MCS", type: "boolean" });
    const merged = mergeFlag(base, createFlag("new"));

    expect(merged).toEqual({
      description: "new",
      variable: "MCS",
      type: "boolean",
      requires: [],
    });
  });

  it("keeps the earlier description when the later flag has none", () => {
    const merged = mergeFlag(
      createFlag("MCS scheduler"),
      createFlag(undefined, { variable: "MCS" }),
    );

    expect(merged.description).toBe("MCS scheduler");
    expect(merged.variable).toBe("MCS");
  });

  it("unions requirement sets without duplicates", () => {
    const first = requirements([[x, singleRequirement(TRUE)]]);
    const second = requirements([[y, singleRequirement(textValue("a"))]]);

    const merged = mergeFlag(
      createFlag("", { requires: [second] }),
      createFlag("", { requires: [requirements([[x, singleRequirement(TRUE)]]), second] }),
    );

    expect(merged.requires).toEqual([first, second]);
  });
});

describe("cmakeArgument", () => {
  it("renders booleans as ON/OFF and text verbatim", () => {
    const flag = createFlag("", { variable: "KernelX86MicroArch" });

    expect(cmakeArgument(flag, TRUE)).toBe("-DKernelX86MicroArch=ON");
    expect(cmakeArgument(flag, FALSE)).toBe("-DKernelX86MicroArch=OFF");
    expect(cmakeArgument(flag, textValue("haswell"))).toBe("-DKernelX86MicroArch=haswell");
  });

  it("skips flags without a variable", () => {
    expect(cmakeArgument(createFlag(""), TRUE)).toBeUndefined();
  });
});
