import path from "node:path";

import { checkSetting, cmakeArguments, type Config } from "../core/config.js";
import type { EventLog } from "../core/logger.js";
import {
  BUILD_CONTAINER_DIR,
  CACHE_SUBDIR,
  CMAKE_CACHE_FILE,
  WORKSPACE_CONTAINER_DIR,
} from "../core/paths.js";
import { contextMounts, type BuildContext } from "../core/workspaces.js";

import type { Container } from "./container.js";

// =============================================================================
// TYPES
// =============================================================================

export type CmakeOptions = {
  config: Config;
  container: Container;
  build: BuildContext;
  /** Host directory mounted at /host, normally the invocation's working directory. */
  hostDir?: string;
  log?: EventLog;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** First configure of a build directory from the project's source tree. */
export function initialCmakeArgs(config: Config, build: BuildContext, source: string): string[] {
  const sourceDir = path.posix.join(WORKSPACE_CONTAINER_DIR, toPosix(source));
  return [
    ...cmakeArguments(config, build.setting),
    "-G",
    "Ninja",
    `-DSEL4_CACHE_DIR=${path.posix.join(WORKSPACE_CONTAINER_DIR, CACHE_SUBDIR)}`,
    "-B",
    BUILD_CONTAINER_DIR,
    "-S",
    sourceDir,
    "-C",
    path.posix.join(sourceDir, CMAKE_CACHE_FILE),
  ];
}

export function updateCmakeArgs(config: Config, build: BuildContext): string[] {
  return [...cmakeArguments(config, build.setting), BUILD_CONTAINER_DIR];
}

/**
 * Check and persist the setting, then configure the build inside the container.
 * The marker is saved before cmake runs so a failed configure keeps the edits.
 */
export async function initBuild(options: CmakeOptions, source: string): Promise<void> {
  await prepare(options);
  await runInBuild(options, ["cmake", ...initialCmakeArgs(options.config, options.build, source)]);
}

export async function updateBuild(options: CmakeOptions): Promise<void> {
  await prepare(options);
  await runInBuild(options, ["cmake", ...updateCmakeArgs(options.config, options.build)]);
}

export async function ninja(
  container: Container,
  build: BuildContext,
  hostDir?: string,
): Promise<void> {
  await container.runChecked({
    mounts: contextMounts(build),
    hostDir,
    workDir: BUILD_CONTAINER_DIR,
    program: ["ninja"],
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function prepare(options: CmakeOptions): Promise<void> {
  checkSetting(options.config, options.build.setting);
  await options.build.save(options.log);
}

async function runInBuild(options: CmakeOptions, program: string[]): Promise<void> {
  await options.container.runChecked({
    mounts: contextMounts(options.build),
    hostDir: options.hostDir,
    workDir: BUILD_CONTAINER_DIR,
    program,
  });
}

function toPosix(p: string): string {
  return p.split(path.sep).join(path.posix.sep);
}
