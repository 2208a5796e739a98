import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { discoverConfigFiles, type ConfigSearchOptions } from "./config-discovery.js";
import { ConfigDocumentSchema, configFromDocument } from "./config-schema.js";
import { mergeConfig, type Config } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { builtinConfigPath } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedConfig = {
  config: Config;
  /** Files merged over the built-in document, in merge order. */
  sources: string[];
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// CONFIG NORMALIZATION
// =============================================================================

const TOP_LEVEL_ALIASES: Record<string, string> = {
  arch: "architecture",
  flags: "flag",
  platforms: "platform",
  projects: "project",
};

const PLATFORM_ALIASES: Record<string, string> = {
  variant: "variation",
  variations: "variation",
};

const PROJECT_ALIASES: Record<string, string> = {
  "source-dir": "source-directory",
  rootserver: "root-server",
  "command-line": "cmdline",
  command_line: "cmdline",
};

function renameKeys(value: unknown, aliases: Record<string, string>): unknown {
  if (!isRecord(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    renamed[aliases[key] ?? key] = entry;
  }
  return renamed;
}

function renameEntryKeys(table: unknown, aliases: Record<string, string>): unknown {
  if (!isRecord(table)) {
    return table;
  }

  return Object.fromEntries(
    Object.entries(table).map(([id, entry]) => [id, renameKeys(entry, aliases)]),
  );
}

function normalizeAliases(doc: unknown): unknown {
  const top = renameKeys(doc, TOP_LEVEL_ALIASES);
  if (!isRecord(top)) {
    return top;
  }

  return {
    ...top,
    ...("platform" in top ? { platform: renameEntryKeys(top.platform, PLATFORM_ALIASES) } : {}),
    ...("project" in top ? { project: renameEntryKeys(top.project, PROJECT_ALIASES) } : {}),
  };
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the path passed to --config.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }
      if (issue.code === "invalid_union") {
        return `${location}: Expected a boolean, string, number or list of those`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file missing.",
    message: `Config file not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/** Parse one configuration document into a config layer. */
export function parseConfigDocument(raw: string, source: string): Config {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${source}${locationDetail}: ${detail}`, err);
  }

  const expanded = expandEnv(doc ?? {}, { file: source, trail: [] });
  const normalized = normalizeAliases(expanded);

  const parsed = ConfigDocumentSchema.safeParse(normalized);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${source}:\n${details}`, parsed.error);
  }

  return configFromDocument(parsed.data, source);
}

export function loadConfigFile(configPath: string): Config {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    return parseConfigDocument(raw, absolutePath);
  } catch (err) {
    throwNormalizedConfigError(err);
  }
}

export function loadBuiltinConfig(): Config {
  return loadConfigFile(builtinConfigPath());
}

/**
 * Built-in document first, then every discovered override in order. The
 * result is never mutated afterwards; callers pass it down explicitly.
 */
export function loadConfig(options: ConfigSearchOptions = {}): LoadedConfig {
  let config = loadBuiltinConfig();
  const sources: string[] = [];

  for (const candidate of discoverConfigFiles(options)) {
    if (!candidate.required && !fs.existsSync(candidate.path)) {
      continue;
    }
    config = mergeConfig(config, loadConfigFile(candidate.path));
    sources.push(candidate.path);
  }

  return { config, sources };
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
