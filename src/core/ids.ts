/**
 * Branded identifiers. Flags, platforms, variations and projects are all
 * named by plain strings in documents; the brands keep them from being
 * passed where a different kind of id is expected.
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

export type FlagId = Brand<"FlagId", string>;
export type PlatformId = Brand<"PlatformId", string>;
export type VariationId = Brand<"VariationId", string>;
export type ProjectId = Brand<"ProjectId", string>;

export const flagId = (raw: string): FlagId => raw as FlagId;
export const platformId = (raw: string): PlatformId => raw as PlatformId;
export const variationId = (raw: string): VariationId => raw as VariationId;
export const projectId = (raw: string): ProjectId => raw as ProjectId;

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
