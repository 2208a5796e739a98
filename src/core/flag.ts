import { InvalidValueError, UnsatisfiedRequirementError } from "./errors.js";
import { compareIds, type FlagId } from "./ids.js";
import { mergeKeyedSet, mergeOptional } from "./merge.js";
import type { Setting } from "./setting.js";
import { checkRequirement, requirementKey, type Requirement, type Value } from "./value.js";

// =============================================================================
// TYPES
// =============================================================================

export type FlagType = "boolean" | "string";

/** One conjunction of a flag's requirements: every entry must hold. */
export type RequirementSet = ReadonlyMap<FlagId, Requirement>;

export type Flag = {
  description?: string;
  /** Build-generator cache variable set from this flag, if any. */
  variable?: string;
  type?: FlagType;
  /** Disjunction of conjunctions; empty means the flag is unconstrained. */
  requires: RequirementSet[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createFlag(
  description: string | undefined,
  options: { variable?: string; type?: FlagType; requires?: RequirementSet[] } = {},
): Flag {
  return {
    description,
    variable: options.variable,
    type: options.type,
    requires: options.requires ?? [],
  };
}

/**
 * Check that `value` may be assigned to the flag given the rest of the
 * setting. Dependencies missing from the setting read as `false`.
 */
export function validateFlag(id: FlagId, flag: Flag, setting: Setting, value: Value): void {
  if (flag.requires.length === 0) {
    return;
  }

  if (value.kind !== "boolean") {
    throw new InvalidValueError(id, value.value);
  }

  if (!value.value) {
    return;
  }

  const satisfied = flag.requires.some((conjunction) =>
    [...conjunction].every(([dependency, requirement]) =>
      checkRequirement(requirement, setting.flag(dependency)),
    ),
  );

  if (!satisfied) {
    throw new UnsatisfiedRequirementError(id);
  }
}

export function mergeFlag(base: Flag, next: Flag): Flag {
  return {
    description: mergeOptional(base.description, next.description),
    variable: mergeOptional(base.variable, next.variable),
    type: mergeOptional(base.type, next.type),
    requires: mergeKeyedSet(base.requires, next.requires, requirementSetKey),
  };
}

/** `-D<variable>=<ON|OFF|text>` for flags that map onto a cache variable. */
export function cmakeArgument(flag: Flag, value: Value): string | undefined {
  if (!flag.variable) {
    return undefined;
  }
  const rendered = value.kind === "boolean" ? (value.value ? "ON" : "OFF") : value.value;
  return `-D${flag.variable}=${rendered}`;
}

export function requirementSetKey(conjunction: RequirementSet): string {
  return [...conjunction]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([id, requirement]) => `${id}=${requirementKey(requirement)}`)
    .join(",");
}
