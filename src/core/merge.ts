/*
Purpose: layered-override combinators shared by every configuration type.
Assumptions: `next` is the later layer and wins on conflict; inputs are never mutated.
*/

import { compareIds } from "./ids.js";

// =============================================================================
// COMBINATORS
// =============================================================================

/** Optional scalar: replaced only when the later layer has a value. */
export function mergeOptional<T>(base: T | undefined, next: T | undefined): T | undefined {
  return next === undefined ? base : next;
}

/** Set: union, kept in sorted order. */
export function mergeSet<T extends string>(base: readonly T[], next: readonly T[]): T[] {
  return [...new Set([...base, ...next])].sort(compareIds);
}

/** Set of structured members: union by a canonical key. */
export function mergeKeyedSet<T>(
  base: readonly T[],
  next: readonly T[],
  keyOf: (item: T) => string,
): T[] {
  const byKey = new Map<string, T>();
  for (const item of [...base, ...next]) {
    const key = keyOf(item);
    if (!byKey.has(key)) byKey.set(key, item);
  }
  return [...byKey.entries()].sort(([a], [b]) => compareIds(a, b)).map(([, item]) => item);
}

/** Mapping: per key, merge when present on both sides, else take whichever side has it. */
export function mergeMap<K extends string, V>(
  base: ReadonlyMap<K, V>,
  next: ReadonlyMap<K, V>,
  mergeValue: (base: V, next: V) => V,
): Map<K, V> {
  const merged = new Map(base);
  for (const [key, value] of next) {
    const existing = merged.get(key);
    merged.set(key, existing === undefined ? value : mergeValue(existing, value));
  }
  return merged;
}

/** Terminal scalar: the later layer always wins. */
export function replace<T>(_base: T, next: T): T {
  return next;
}
