import path from "node:path";

import { lookupProject } from "../core/config.js";
import { projectId } from "../core/ids.js";
import { formatRepository } from "../core/project.js";
import { WorkspaceContext } from "../core/workspaces.js";
import { ManifestTool } from "../tools/repo.js";

import type { CliSession } from "./context.js";

// =============================================================================
// INIT (workspace creation + checkout)
// =============================================================================

export type InitCommandOptions = {
  /** Defaults to a directory named after the project under the working directory. */
  directory?: string;
  sync: boolean;
};

export async function initCommand(
  session: CliSession,
  projectName: string,
  opts: InitCommandOptions,
): Promise<WorkspaceContext> {
  const project = projectId(projectName);
  const entry = lookupProject(await session.config(), project);
  const dir = path.resolve(session.cwd, opts.directory ?? projectName);

  const workspace = await WorkspaceContext.create(project, dir);
  const log = session.useWorkspaceLog(workspace.root);
  log.log({ type: "workspace.create", payload: { project, root: workspace.root } });
  console.log(`Created workspace for ${project} at ${workspace.root}`);

  if (!opts.sync) {
    return workspace;
  }

  if (!entry.repository) {
    console.log(`Project ${project} has no repository; skipping checkout.`);
    return workspace;
  }

  const defaults = await session.defaults();
  const tool = await ManifestTool.locate(session.runner(), defaults, { env: session.env });
  await tool.checkout(entry.repository, workspace.root);
  console.log(`Checked out ${formatRepository(entry.repository)}`);

  return workspace;
}
