import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// CONSTANTS
// =============================================================================

export const WORKSPACE_MARKER = ".s4-workspace.yaml";
export const BUILD_MARKER = ".s4-build.yaml";
export const CACHE_SUBDIR = ".s4_cache";
export const EASY_SETTINGS_FILE = "easy-settings.cmake";
export const CMAKE_CACHE_FILE = "settings.cmake";
export const WORKSPACE_CONFIG_FILE = ".s4.yaml";
export const IMAGES_DIR = "images";

// Container-side mount points.
export const WORKSPACE_CONTAINER_DIR = "/workspace";
export const BUILD_CONTAINER_DIR = "/build";
export const HOST_CONTAINER_DIR = "/host";

// =============================================================================
// PATH HELPERS
// =============================================================================

export function resolvePackageRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // src/core/... in development, dist/src/core/... when built.
  const up = path.basename(path.resolve(here, "..", "..")) === "dist" ? 3 : 2;
  return path.resolve(here, ...Array<string>(up).fill(".."));
}

export function builtinConfigPath(): string {
  return path.join(resolvePackageRoot(), "templates", "builtin-config.yaml");
}

export function workspaceMarkerPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKSPACE_MARKER);
}

export function buildMarkerPath(buildRoot: string): string {
  return path.join(buildRoot, BUILD_MARKER);
}

export function workspaceCacheDir(workspaceRoot: string): string {
  return path.join(workspaceRoot, CACHE_SUBDIR);
}

export function workspaceLogPath(workspaceRoot: string): string {
  return path.join(workspaceCacheDir(workspaceRoot), "logs", "s4.jsonl");
}

export function workspaceConfigPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKSPACE_CONFIG_FILE);
}

export function userConfigPaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string[] {
  const configHome = env.XDG_CONFIG_HOME || path.join(home, ".config");
  return [path.join(home, ".s4.yaml"), path.join(home, ".s4.yml"), path.join(configHome, "s4.yaml")];
}
