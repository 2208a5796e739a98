import path from "node:path";

import fse from "fs-extra";

import { architectureFamily, type Architecture } from "./architecture.js";
import { platformSetting, type Config } from "./config.js";
import { inferSourceDirectory, readEasySettings } from "./easy-settings.js";
import { FilesystemConflictError, NotFoundError } from "./errors.js";
import type { Flag } from "./flag.js";
import type { FlagId, PlatformId, ProjectId, VariationId } from "./ids.js";
import { logMarkerWrite, NullEventLog, type EventLog } from "./logger.js";
import {
  readBuildMarker,
  readWorkspaceMarker,
  writeBuildMarker,
  writeWorkspaceMarker,
  type BuildDocument,
  type WorkspaceDocument,
} from "./markers.js";
import {
  BUILD_CONTAINER_DIR,
  IMAGES_DIR,
  WORKSPACE_CONTAINER_DIR,
  buildMarkerPath,
  workspaceCacheDir,
  workspaceMarkerPath,
} from "./paths.js";
import { Setting } from "./setting.js";
import { ensureDir, isDirectory, pathExists, relativePath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Context = WorkspaceContext | BuildContext;

export type CreateBuildOptions = {
  platform: PlatformId;
  variation?: VariationId;
  architecture: Architecture;
  /** Caller overrides merged over the resolved setting. */
  setting?: Setting;
  path: string;
};

// =============================================================================
// WORKSPACE
// =============================================================================

export class WorkspaceContext {
  readonly kind = "workspace" as const;

  private constructor(
    readonly root: string,
    private readonly document: WorkspaceDocument,
  ) {}

  static async create(
    project: ProjectId,
    dir: string,
    log: EventLog = new NullEventLog(),
  ): Promise<WorkspaceContext> {
    const root = path.resolve(dir);
    await prepareEmptyDirectory(root, "Workspace");
    await ensureDir(workspaceCacheDir(root));

    const document: WorkspaceDocument = { project, builds: [] };
    logMarkerWrite(log, "workspace", await writeWorkspaceMarker(root, document));

    return new WorkspaceContext(root, document);
  }

  static async load(dir: string): Promise<WorkspaceContext> {
    const root = path.resolve(dir);
    return new WorkspaceContext(root, await readWorkspaceMarker(root));
  }

  get project(): ProjectId {
    return this.document.project;
  }

  get buildPaths(): readonly string[] {
    return this.document.builds;
  }

  /**
   * Builds recorded in the marker. Entries whose directory has gone, that
   * hold no build marker, or whose marker points at another workspace are
   * skipped; they stay in the marker.
   */
  async builds(): Promise<BuildContext[]> {
    const builds: BuildContext[] = [];
    const canonicalRoot = await fse.realpath(this.root);

    for (const entry of this.document.builds) {
      const buildRoot = path.resolve(this.root, entry);
      if (!(await pathExists(buildMarkerPath(buildRoot)))) continue;

      const build = await BuildContext.load(this, buildRoot);
      const backPath = path.resolve(buildRoot, build.document.workspaceRoot);
      if (!(await pathExists(backPath))) continue;
      if ((await fse.realpath(backPath)) !== canonicalRoot) continue;

      builds.push(build);
    }

    return builds;
  }

  /**
   * Read-modify-write of the workspace marker from this context's in-memory
   * copy. There is no lock: two processes registering builds at the same
   * time race, and the later write drops the other's entry.
   */
  async registerBuild(buildRoot: string, log: EventLog = new NullEventLog()): Promise<void> {
    const entry = await relativePath(this.root, buildRoot);
    if (!this.document.builds.includes(entry)) {
      this.document.builds = [...this.document.builds, entry].sort();
    }
    logMarkerWrite(log, "workspace", await writeWorkspaceMarker(this.root, this.document));
  }
}

// =============================================================================
// BUILD
// =============================================================================

export class BuildContext {
  readonly kind = "build" as const;

  private constructor(
    readonly workspace: WorkspaceContext,
    readonly root: string,
    readonly document: BuildDocument,
  ) {}

  /**
   * Resolve the setting for the platform choice, write the build marker, then
   * register the build in the workspace marker. The two writes are separate:
   * a failure between them leaves an unregistered build behind.
   */
  static async create(
    config: Config,
    workspace: WorkspaceContext,
    options: CreateBuildOptions,
    log: EventLog = new NullEventLog(),
  ): Promise<BuildContext> {
    const root = path.resolve(options.path);

    const setting = platformSetting(
      config,
      workspace.project,
      options.platform,
      options.variation,
      options.architecture,
    );
    if (options.setting) {
      setting.merge(options.setting);
    }

    await prepareEmptyDirectory(root, "Build");

    const document: BuildDocument = {
      workspaceRoot: await relativePath(root, workspace.root),
      platform: options.platform,
      variation: options.variation,
      architecture: options.architecture,
      setting,
    };

    const build = new BuildContext(workspace, root, document);
    await build.save(log);
    await workspace.registerBuild(root, log);
    return build;
  }

  static async load(workspace: WorkspaceContext, dir: string): Promise<BuildContext> {
    const root = path.resolve(dir);
    return new BuildContext(workspace, root, await readBuildMarker(root));
  }

  get platform(): PlatformId {
    return this.document.platform;
  }

  get variation(): VariationId | undefined {
    return this.document.variation;
  }

  get architecture(): Architecture {
    return this.document.architecture;
  }

  get setting(): Setting {
    return this.document.setting;
  }

  /** Merge edits into the stored setting. Call `save` to persist them. */
  updateSetting(setting: Setting): void {
    this.document.setting.merge(setting);
  }

  /** Rewrites the build marker only. */
  async save(log: EventLog = new NullEventLog()): Promise<void> {
    logMarkerWrite(log, "build", await writeBuildMarker(this.root, this.document));
  }

  platformImageName(): string {
    const family = architectureFamily(this.architecture);
    const prefix = family === "x86" ? this.architecture : family;
    return `${prefix}-${this.platform}`;
  }

  /** Kernel image, relative to the build root. */
  async kernelImagePath(): Promise<string> {
    return this.existingImage(`kernel-${this.platformImageName()}`);
  }

  /** Root-server image, relative to the build root. */
  async imagePath(rootServer: string): Promise<string> {
    return this.existingImage(`${rootServer}-image-${this.platformImageName()}`);
  }

  /**
   * Root server named by the images directory. When several images match,
   * the lexicographically smallest name wins.
   */
  async inferredRootServer(): Promise<string> {
    const imagesDir = path.join(this.root, IMAGES_DIR);
    if (!(await isDirectory(imagesDir))) {
      throw new NotFoundError("image", IMAGES_DIR, `Images directory is missing in ${this.root}`);
    }

    const tail = `-image-${this.platformImageName()}`;
    const match = (await fse.readdir(imagesDir))
      .filter((name) => name.endsWith(tail) && name.length > tail.length)
      .sort()[0];

    if (match === undefined) {
      throw new NotFoundError("image", tail, `No root server image in ${imagesDir}`);
    }
    return match.slice(0, -tail.length);
  }

  private async existingImage(filename: string): Promise<string> {
    const relative = path.join(IMAGES_DIR, filename);
    if (!(await pathExists(path.join(this.root, relative)))) {
      throw new NotFoundError("image", relative, `Image file missing: ${relative}`);
    }
    return relative;
  }
}

// =============================================================================
// SHARED CONTEXT HELPERS
// =============================================================================

export function contextWorkspace(context: Context): WorkspaceContext {
  return context.kind === "workspace" ? context : context.workspace;
}

export function maybeBuildRoot(context: Context): string | undefined {
  return context.kind === "build" ? context.root : undefined;
}

/** Container path to host path for every directory the context needs mounted. */
export function contextMounts(context: Context): Map<string, string> {
  const mounts = new Map<string, string>([
    [WORKSPACE_CONTAINER_DIR, contextWorkspace(context).root],
  ]);
  const buildRoot = maybeBuildRoot(context);
  if (buildRoot) {
    mounts.set(BUILD_CONTAINER_DIR, buildRoot);
  }
  return mounts;
}

export async function contextEasySettings(context: Context): Promise<Map<FlagId, Flag>> {
  return readEasySettings(contextWorkspace(context).root);
}

export async function inferredSource(context: Context): Promise<string> {
  const root = contextWorkspace(context).root;
  const source = await inferSourceDirectory(root);
  if (source === undefined) {
    throw new NotFoundError("context", root, `Could not infer source directory in ${root}`);
  }
  return source;
}

/**
 * Walk up from `cwd` to the filesystem root. At each level a build marker is
 * checked before a workspace marker; the closest marker of either kind wins.
 */
export async function findContext(cwd: string): Promise<Context | undefined> {
  let current = path.resolve(cwd);
  while (true) {
    if (await pathExists(buildMarkerPath(current))) {
      const document = await readBuildMarker(current);
      const workspace = await WorkspaceContext.load(path.resolve(current, document.workspaceRoot));
      return BuildContext.load(workspace, current);
    }

    if (await pathExists(workspaceMarkerPath(current))) {
      return WorkspaceContext.load(current);
    }

    const parent = path.dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// An existing empty directory is reused; anything else at the path is a conflict.
async function prepareEmptyDirectory(dir: string, label: "Workspace" | "Build"): Promise<void> {
  if (await pathExists(dir)) {
    if (!(await isDirectory(dir))) {
      throw new FilesystemConflictError(dir, `${label} directory path ${dir} already exists`);
    }
    if ((await fse.readdir(dir)).length > 0) {
      throw new FilesystemConflictError(dir, `${label} directory ${dir} is not empty`);
    }
  }
  await ensureDir(dir);
}
