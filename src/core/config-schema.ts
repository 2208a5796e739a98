import { z } from "zod";

import { parseArchitecture, type Architecture } from "./architecture.js";
import type { Config, Defaults } from "./config.js";
import { ConfigError, ParseError } from "./errors.js";
import type { Flag, RequirementSet } from "./flag.js";
import {
  flagId,
  platformId,
  projectId,
  variationId,
  type FlagId,
  type PlatformId,
  type ProjectId,
  type VariationId,
} from "./ids.js";
import type { Platform, Variation } from "./platform.js";
import { parseRepository, type Project } from "./project.js";
import { Setting } from "./setting.js";
import { decodeRequirement, type Requirement } from "./value.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const RawValueSchema = z.union([z.boolean(), z.string(), z.number()]);

export const RawRequirementSchema = z.union([RawValueSchema, z.array(RawValueSchema)]);

const SettingFieldsSchema = z.record(RawValueSchema);

export const FlagSchema = z
  .object({
    description: z.string().optional(),
    variable: z.string().min(1).optional(),
    type: z.enum(["boolean", "string"]).optional(),
    requires: z.array(z.record(RawRequirementSchema)).default([]),
  })
  .strict();

export const PlatformSchema = z
  .object({
    architectures: z.array(z.string()).default([]),
    variation: z.record(SettingFieldsSchema).default({}),
  })
  .catchall(RawValueSchema);

export const ProjectSchema = z
  .object({
    repository: z.string().optional(),
    "source-directory": z.string().min(1).optional(),
    "root-server": z.string().min(1).optional(),
    "exit-phrase": z.string().min(1).optional(),
    cmdline: z.array(z.string()).default([]),
  })
  .catchall(RawValueSchema);

export const ConfigDocumentSchema = z
  .object({
    "git-server": z.string().min(1).optional(),
    "docker-image": z.string().min(1).optional(),
    "repo-url": z.string().min(1).optional(),
    "repo-branch": z.string().min(1).optional(),
    "repo-manifest": z.string().min(1).optional(),
    "exit-phrase": z.string().min(1).optional(),
    flag: z.record(FlagSchema).default({}),
    platform: z.record(PlatformSchema).default({}),
    architecture: z.record(SettingFieldsSchema).default({}),
    project: z.record(ProjectSchema).default({}),
  })
  .strict();

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

// =============================================================================
// DECODING
// =============================================================================

/** Convert a validated document into a config layer. `source` names the file in errors. */
export function configFromDocument(doc: ConfigDocument, source: string): Config {
  const defaults: Defaults = {
    gitServer: doc["git-server"],
    dockerImage: doc["docker-image"],
    repoUrl: doc["repo-url"],
    repoBranch: doc["repo-branch"],
    repoManifest: doc["repo-manifest"],
    exitPhrase: doc["exit-phrase"],
  };

  const flags = new Map<FlagId, Flag>();
  for (const [id, raw] of Object.entries(doc.flag)) {
    flags.set(flagId(id), decodeFlag(raw, source, ["flag", id]));
  }

  const platforms = new Map<PlatformId, Platform>();
  for (const [id, raw] of Object.entries(doc.platform)) {
    platforms.set(platformId(id), decodePlatform(raw, source, ["platform", id]));
  }

  const architectures = new Map<Architecture, Setting>();
  for (const [token, raw] of Object.entries(doc.architecture)) {
    const trail = ["architecture", token];
    const architecture = wrapParse(() => parseArchitecture(token), source, trail);
    architectures.set(architecture, Setting.fromRecord(raw).setting);
  }

  const projects = new Map<ProjectId, Project>();
  for (const [id, raw] of Object.entries(doc.project)) {
    projects.set(projectId(id), decodeProject(raw, source, ["project", id]));
  }

  return { defaults, flags, platforms, architectures, projects };
}

// =============================================================================
// INTERNALS
// =============================================================================

function decodeFlag(raw: z.infer<typeof FlagSchema>, source: string, trail: string[]): Flag {
  const requires: RequirementSet[] = raw.requires.map((conjunction, index) => {
    const entries = new Map<FlagId, Requirement>();
    for (const [dependency, rawRequirement] of Object.entries(conjunction)) {
      const requirement = decodeRequirement(rawRequirement);
      if (!requirement) {
        throw new ConfigError(
          `${source} (${[...trail, "requires", `${index}`, dependency].join(".")}): invalid requirement`,
        );
      }
      entries.set(flagId(dependency), requirement);
    }
    return entries;
  });

  return {
    description: raw.description,
    variable: raw.variable,
    type: raw.type,
    requires,
  };
}

function decodePlatform(
  raw: z.infer<typeof PlatformSchema>,
  source: string,
  trail: string[],
): Platform {
  const { architectures: rawArchitectures, variation: rawVariations, ...fields } = raw;

  const architectures = rawArchitectures.map((token, index) =>
    wrapParse(() => parseArchitecture(token), source, [...trail, "architectures", `${index}`]),
  );

  const variations = new Map<VariationId, Variation>();
  for (const [id, settingFields] of Object.entries(rawVariations)) {
    variations.set(variationId(id), { setting: Setting.fromRecord(settingFields).setting });
  }

  return {
    architectures: [...new Set(architectures)].sort(),
    variations,
    setting: Setting.fromRecord(fields).setting,
  };
}

function decodeProject(
  raw: z.infer<typeof ProjectSchema>,
  source: string,
  trail: string[],
): Project {
  const {
    repository,
    "source-directory": sourceDirectory,
    "root-server": rootServer,
    "exit-phrase": exitPhrase,
    cmdline,
    ...fields
  } = raw;

  return {
    repository:
      repository === undefined
        ? undefined
        : wrapParse(() => parseRepository(repository), source, [...trail, "repository"]),
    sourceDirectory,
    rootServer,
    exitPhrase,
    commandLine: [...new Set(cmdline.map(flagId))].sort(),
    setting: Setting.fromRecord(fields).setting,
  };
}

function wrapParse<T>(parse: () => T, source: string, trail: string[]): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ConfigError(`${source} (${trail.join(".")}): ${err.message}`, err);
    }
    throw err;
  }
}
