import path from "node:path";

import fse from "fs-extra";

import { createFlag, type Flag, type FlagType } from "./flag.js";
import { flagId, type FlagId } from "./ids.js";
import { EASY_SETTINGS_FILE } from "./paths.js";
import { relativePath } from "./utils.js";

// set(VARIABLE <default> CACHE <TYPE> "<description>")
const SETTING_LINE =
  /^set\((?<variable>[A-Za-z][A-Za-z0-9_]*)( [^ ]+){2} (?<type>[A-Z]+) "(?<description>[^"]*)"\)$/;

const CACHE_TYPES: Record<string, FlagType> = {
  STRING: "string",
  BOOL: "boolean",
};

/**
 * Flags declared by the project's easy-settings file at the workspace root.
 * A missing file declares nothing.
 */
export async function readEasySettings(workspaceRoot: string): Promise<Map<FlagId, Flag>> {
  const filePath = path.join(workspaceRoot, EASY_SETTINGS_FILE);
  if (!(await fse.pathExists(filePath))) {
    return new Map();
  }

  return parseEasySettings(await fse.readFile(filePath, "utf8"));
}

export function parseEasySettings(content: string): Map<FlagId, Flag> {
  const flags = new Map<FlagId, Flag>();

  for (const line of content.split(/\r?\n/)) {
    const groups = SETTING_LINE.exec(line.trim())?.groups;
    if (!groups) continue;

    const { variable, type, description } = groups;
    flags.set(
      flagId(variableToFlagName(variable)),
      createFlag(description, { variable, type: CACHE_TYPES[type] }),
    );
  }

  return flags;
}

/** `SCREAMING_SNAKE` and `PascalCase` variable names both become kebab-case. */
export function variableToFlagName(variable: string): string {
  if (/^[A-Z0-9_]+$/.test(variable)) {
    return variable.toLowerCase().replace(/_/g, "-");
  }

  return variable
    .split("")
    .map((char, index) =>
      index > 0 && /[A-Z]/.test(char) ? `-${char.toLowerCase()}` : char.toLowerCase(),
    )
    .join("");
}

/**
 * Source directory relative to the workspace root, taken from where the
 * easy-settings file really lives (it is usually a symlink into the source tree).
 */
export async function inferSourceDirectory(workspaceRoot: string): Promise<string | undefined> {
  const hintPath = path.join(workspaceRoot, EASY_SETTINGS_FILE);
  if (!(await fse.pathExists(hintPath))) {
    return undefined;
  }

  const target = await fse.realpath(hintPath);
  return relativePath(workspaceRoot, path.dirname(target));
}
