import type { Architecture } from "./architecture.js";
import { ParseError } from "./errors.js";
import { platformId, variationId, type PlatformId, type VariationId } from "./ids.js";
import { mergeMap, mergeSet } from "./merge.js";
import { Setting } from "./setting.js";

// =============================================================================
// TYPES
// =============================================================================

export type Variation = {
  setting: Setting;
};

export type Platform = {
  architectures: Architecture[];
  variations: Map<VariationId, Variation>;
  setting: Setting;
};

export type PlatformChoice = {
  platform: PlatformId;
  variation?: VariationId;
};

// =============================================================================
// MERGE
// =============================================================================

export function mergeVariation(base: Variation, next: Variation): Variation {
  return { setting: base.setting.clone().merge(next.setting) };
}

export function mergePlatform(base: Platform, next: Platform): Platform {
  return {
    architectures: mergeSet(base.architectures, next.architectures),
    variations: mergeMap(base.variations, next.variations, mergeVariation),
    setting: base.setting.clone().merge(next.setting),
  };
}

// =============================================================================
// PLATFORM CHOICE
// =============================================================================

/** Parse `platform` or `platform:variation`. */
export function parsePlatformChoice(input: string): PlatformChoice {
  const parts = input.split(":");
  if (parts.length > 2 || parts.some((part) => part.trim() === "")) {
    throw new ParseError(
      "platform choice",
      input,
      `Invalid platform "${input}" (expected <platform> or <platform>:<variation>)`,
    );
  }

  const [platform, variation] = parts;
  return variation === undefined
    ? { platform: platformId(platform) }
    : { platform: platformId(platform), variation: variationId(variation) };
}

export function formatPlatformChoice(choice: PlatformChoice): string {
  return choice.variation ? `${choice.platform}:${choice.variation}` : choice.platform;
}
