import { architectureFamily, type Architecture } from "./architecture.js";
import { NotFoundError } from "./errors.js";
import { cmakeArgument, mergeFlag, validateFlag, type Flag } from "./flag.js";
import {
  compareIds,
  flagId,
  type FlagId,
  type PlatformId,
  type ProjectId,
  type VariationId,
} from "./ids.js";
import { mergeMap, mergeOptional } from "./merge.js";
import { mergePlatform, type Platform } from "./platform.js";
import { mergeProject, type Project } from "./project.js";
import { Setting } from "./setting.js";

// =============================================================================
// TYPES
// =============================================================================

export type Defaults = {
  gitServer?: string;
  dockerImage?: string;
  repoUrl?: string;
  repoBranch?: string;
  repoManifest?: string;
  exitPhrase?: string;
};

export type ResolvedDefaults = {
  gitServer: string;
  dockerImage: string;
  repoUrl: string;
  repoBranch?: string;
  repoManifest?: string;
  exitPhrase: string;
};

export type Config = {
  readonly defaults: Readonly<Defaults>;
  readonly flags: ReadonlyMap<FlagId, Flag>;
  readonly platforms: ReadonlyMap<PlatformId, Platform>;
  readonly architectures: ReadonlyMap<Architecture, Setting>;
  readonly projects: ReadonlyMap<ProjectId, Project>;
};

export const DEFAULT_GIT_SERVER = "https://github.com";
export const DEFAULT_DOCKER_IMAGE = "docker.io/trustworthysystems/camkes-riscv";
export const DEFAULT_REPO_URL = "https://storage.googleapis.com/git-repo-downloads/repo";
export const DEFAULT_EXIT_PHRASE = "All is well in the universe";

const ARCHITECTURE_FLAG = flagId("architecture");
const SEL4_ARCHITECTURE_FLAG = flagId("sel4-architecture");

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function emptyConfig(): Config {
  return {
    defaults: {},
    flags: new Map(),
    platforms: new Map(),
    architectures: new Map(),
    projects: new Map(),
  };
}

export function mergeDefaults(base: Defaults, next: Defaults): Defaults {
  return {
    gitServer: mergeOptional(base.gitServer, next.gitServer),
    dockerImage: mergeOptional(base.dockerImage, next.dockerImage),
    repoUrl: mergeOptional(base.repoUrl, next.repoUrl),
    repoBranch: mergeOptional(base.repoBranch, next.repoBranch),
    repoManifest: mergeOptional(base.repoManifest, next.repoManifest),
    exitPhrase: mergeOptional(base.exitPhrase, next.exitPhrase),
  };
}

export function mergeConfig(base: Config, next: Config): Config {
  return {
    defaults: mergeDefaults(base.defaults, next.defaults),
    flags: mergeMap(base.flags, next.flags, mergeFlag),
    platforms: mergeMap(base.platforms, next.platforms, mergePlatform),
    architectures: mergeMap(base.architectures, next.architectures, (a, b) =>
      a.clone().merge(b),
    ),
    projects: mergeMap(base.projects, next.projects, mergeProject),
  };
}

export function resolveDefaults(defaults: Defaults): ResolvedDefaults {
  return {
    gitServer: defaults.gitServer ?? DEFAULT_GIT_SERVER,
    dockerImage: defaults.dockerImage ?? DEFAULT_DOCKER_IMAGE,
    repoUrl: defaults.repoUrl ?? DEFAULT_REPO_URL,
    repoBranch: defaults.repoBranch,
    repoManifest: defaults.repoManifest,
    exitPhrase: defaults.exitPhrase ?? DEFAULT_EXIT_PHRASE,
  };
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function lookupProject(config: Config, id: ProjectId): Project {
  const project = config.projects.get(id);
  if (!project) {
    throw new NotFoundError("project", id, `No such project ${id}`);
  }
  return project;
}

export function lookupPlatform(config: Config, id: PlatformId): Platform {
  const platform = config.platforms.get(id);
  if (!platform) {
    throw new NotFoundError("platform", id, `No such platform ${id}`);
  }
  return platform;
}

export function sortedPlatforms(config: Config): Array<[PlatformId, Platform]> {
  return [...config.platforms.entries()].sort(([a], [b]) => compareIds(a, b));
}

/** Flags a project exposes on the command line, in id order. Unknown ids are skipped. */
export function commandLineFlags(config: Config, project: Project): Map<FlagId, Flag> {
  const flags = new Map<FlagId, Flag>();
  for (const id of [...project.commandLine].sort(compareIds)) {
    const flag = config.flags.get(id);
    if (flag) flags.set(id, flag);
  }
  return flags;
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Effective setting for a build. Layers apply in order, each overriding the
 * last: platform, variation, architecture table entry, project.
 */
export function platformSetting(
  config: Config,
  project: ProjectId,
  platform: PlatformId,
  variation: VariationId | undefined,
  architecture: Architecture,
): Setting {
  const platformEntry = lookupPlatform(config, platform);

  const setting = Setting.empty();
  setting.setKernelPlatform(platform);
  setting.setPlatform(platform);
  setting.merge(platformEntry.setting);

  if (variation !== undefined) {
    const variationEntry = platformEntry.variations.get(variation);
    if (!variationEntry) {
      throw new NotFoundError(
        "variation",
        variation,
        `No such platform variation ${variation} for platform ${platform}`,
      );
    }
    setting.setPlatform(variation);
    setting.merge(variationEntry.setting);
  }

  setting.setText(SEL4_ARCHITECTURE_FLAG, architecture);
  setting.setText(ARCHITECTURE_FLAG, architectureFamily(architecture));

  const architectureSetting = config.architectures.get(architecture);
  if (architectureSetting) {
    setting.merge(architectureSetting);
  }

  setting.merge(lookupProject(config, project).setting);
  return setting;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Single pass over the final setting: every present flag known to the
 * catalog is validated once. Dependencies are not re-validated transitively.
 */
export function checkSetting(config: Config, setting: Setting): void {
  for (const [id, value] of setting.entries()) {
    const flag = config.flags.get(id);
    if (flag) {
      validateFlag(id, flag, setting, value);
    }
  }
}

export function cmakeArguments(config: Config, setting: Setting): string[] {
  const args: string[] = [];
  for (const [id, value] of setting.entries()) {
    const flag = config.flags.get(id);
    const arg = flag ? cmakeArgument(flag, value) : undefined;
    if (arg) args.push(arg);
  }
  return args;
}
