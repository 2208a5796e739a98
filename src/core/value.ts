import { compareIds } from "./ids.js";

// =============================================================================
// TYPES
// =============================================================================

export type BooleanValue = { kind: "boolean"; value: boolean };
export type TextValue = { kind: "text"; value: string };
export type Value = BooleanValue | TextValue;

export type Requirement = { kind: "single"; value: Value } | { kind: "any"; values: Value[] };

/** Plain document form of a Value. */
export type RawValue = boolean | string;

/** Plain document form of a Requirement. */
export type RawRequirement = RawValue | RawValue[];

// =============================================================================
// VALUES
// =============================================================================

export const booleanValue = (value: boolean): BooleanValue => ({ kind: "boolean", value });
export const textValue = (value: string): TextValue => ({ kind: "text", value });

export const TRUE: BooleanValue = booleanValue(true);
export const FALSE: BooleanValue = booleanValue(false);

// Booleans sort before text, then by payload.
export function compareValues(a: Value, b: Value): number {
  if (a.kind !== b.kind) {
    return a.kind === "boolean" ? -1 : 1;
  }
  if (a.kind === "boolean" && b.kind === "boolean") {
    return Number(a.value) - Number(b.value);
  }
  return compareIds(String(a.value), String(b.value));
}

export function valuesEqual(a: Value, b: Value): boolean {
  return compareValues(a, b) === 0;
}

export function formatValue(value: Value): string {
  return value.kind === "boolean" ? String(value.value) : JSON.stringify(value.value);
}

export function toRawValue(value: Value): RawValue {
  return value.value;
}

/**
 * Tagged decode of a document value: boolean first, then string, then number
 * (rendered as text). Anything else yields undefined.
 */
export function decodeValue(raw: unknown): Value | undefined {
  if (typeof raw === "boolean") {
    return booleanValue(raw);
  }
  if (typeof raw === "string") {
    return textValue(raw);
  }
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return textValue(String(raw));
  }
  return undefined;
}

// =============================================================================
// REQUIREMENTS
// =============================================================================

export function singleRequirement(value: Value): Requirement {
  return { kind: "single", value };
}

export function anyRequirement(values: Value[]): Requirement {
  return { kind: "any", values: uniqueSortedValues(values) };
}

export function checkRequirement(requirement: Requirement, value: Value): boolean {
  if (requirement.kind === "single") {
    return valuesEqual(requirement.value, value);
  }
  return requirement.values.some((candidate) => valuesEqual(candidate, value));
}

export function decodeRequirement(raw: unknown): Requirement | undefined {
  if (Array.isArray(raw)) {
    const values: Value[] = [];
    for (const item of raw) {
      const decoded = decodeValue(item);
      if (!decoded) return undefined;
      values.push(decoded);
    }
    return anyRequirement(values);
  }

  const value = decodeValue(raw);
  return value ? singleRequirement(value) : undefined;
}

export function toRawRequirement(requirement: Requirement): RawRequirement {
  return requirement.kind === "single"
    ? toRawValue(requirement.value)
    : requirement.values.map(toRawValue);
}

export function requirementKey(requirement: Requirement): string {
  return JSON.stringify(toRawRequirement(requirement));
}

// =============================================================================
// INTERNALS
// =============================================================================

function uniqueSortedValues(values: Value[]): Value[] {
  const sorted = [...values].sort(compareValues);
  return sorted.filter((value, index) => index === 0 || !valuesEqual(sorted[index - 1], value));
}
