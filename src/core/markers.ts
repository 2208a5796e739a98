import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { isArchitecture, type Architecture } from "./architecture.js";
import { formatIssues } from "./config-loader.js";
import { RawValueSchema } from "./config-schema.js";
import { ConfigError, FilesystemConflictError } from "./errors.js";
import {
  compareIds,
  platformId,
  projectId,
  variationId,
  type PlatformId,
  type ProjectId,
  type VariationId,
} from "./ids.js";
import { buildMarkerPath, workspaceMarkerPath } from "./paths.js";
import { Setting } from "./setting.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkspaceDocument = {
  project: ProjectId;
  /** Build directories relative to the workspace root. */
  builds: string[];
};

export type BuildDocument = {
  /** Path from the build directory back to its workspace root. */
  workspaceRoot: string;
  platform: PlatformId;
  variation?: VariationId;
  architecture: Architecture;
  setting: Setting;
};

// =============================================================================
// SCHEMAS
// =============================================================================

export const WorkspaceMarkerSchema = z
  .object({
    project: z.string().min(1),
    builds: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const BuildMarkerSchema = z
  .object({
    "workspace-root": z.string().min(1),
    "build-platform": z.string().min(1),
    "build-variation": z.string().min(1).optional(),
    "build-architecture": z.string().refine(isArchitecture, {
      message: "Expected an seL4 architecture token",
    }),
  })
  .catchall(RawValueSchema);

// =============================================================================
// WORKSPACE MARKER
// =============================================================================

export async function readWorkspaceMarker(workspaceRoot: string): Promise<WorkspaceDocument> {
  const markerPath = workspaceMarkerPath(workspaceRoot);
  const doc = await readMarker(markerPath, "Workspace");

  const parsed = WorkspaceMarkerSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid workspace marker at ${markerPath}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return {
    project: projectId(parsed.data.project),
    builds: [...new Set(parsed.data.builds)].sort(compareIds),
  };
}

export async function writeWorkspaceMarker(
  workspaceRoot: string,
  workspace: WorkspaceDocument,
): Promise<string> {
  const markerPath = workspaceMarkerPath(workspaceRoot);
  await writeMarkerFile(markerPath, {
    project: workspace.project,
    builds: [...new Set(workspace.builds)].sort(compareIds),
  });
  return markerPath;
}

// =============================================================================
// BUILD MARKER
// =============================================================================

export async function readBuildMarker(buildRoot: string): Promise<BuildDocument> {
  const markerPath = buildMarkerPath(buildRoot);
  const doc = await readMarker(markerPath, "Build");

  const parsed = BuildMarkerSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid build marker at ${markerPath}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const {
    "workspace-root": workspaceRoot,
    "build-platform": platform,
    "build-variation": variation,
    "build-architecture": architecture,
    ...fields
  } = parsed.data;

  if (!isArchitecture(architecture)) {
    throw new ConfigError(`Invalid build marker at ${markerPath}: unknown architecture`);
  }

  return {
    workspaceRoot,
    platform: platformId(platform),
    variation: variation === undefined ? undefined : variationId(variation),
    architecture,
    setting: Setting.fromRecord(fields).setting,
  };
}

export async function writeBuildMarker(buildRoot: string, build: BuildDocument): Promise<string> {
  const markerPath = buildMarkerPath(buildRoot);
  const header: Record<string, string> = {
    "workspace-root": build.workspaceRoot,
    "build-platform": build.platform,
  };
  if (build.variation !== undefined) {
    header["build-variation"] = build.variation;
  }
  header["build-architecture"] = build.architecture;

  await writeMarkerFile(markerPath, { ...header, ...build.setting.toRecord() });
  return markerPath;
}

// =============================================================================
// FILE IO
// =============================================================================

async function readMarker(markerPath: string, kind: "Workspace" | "Build"): Promise<unknown> {
  if (!(await fse.pathExists(markerPath))) {
    throw new FilesystemConflictError(
      markerPath,
      `${kind} marker not found at ${markerPath}`,
    );
  }

  const raw = await fse.readFile(markerPath, "utf8");
  try {
    return yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${kind.toLowerCase()} marker at ${markerPath}`, err);
  }
}

// Each marker is replaced atomically on its own; two markers are never updated together.
async function writeMarkerFile(markerPath: string, doc: Record<string, unknown>): Promise<void> {
  await fse.ensureDir(path.dirname(markerPath));

  const tmpPath = `${markerPath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(yaml.dump(doc, { lineWidth: -1 }), "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, markerPath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
