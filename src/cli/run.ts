import { architectureFamily } from "../core/architecture.js";
import { ExternalToolError } from "../core/errors.js";
import type { BuildContext } from "../core/workspaces.js";
import { MachineQueue } from "../tools/machine-queue.js";

import type { CliSession } from "./context.js";

// =============================================================================
// RUN (hardware test through the machine queue)
// =============================================================================

export type RunCommandOptions = {
  /** Skip matching and run on this system or pool only. */
  system?: string;
};

export async function runCommand(session: CliSession, opts: RunCommandOptions): Promise<string> {
  const build = await session.requireBuild();
  const project = await session.project();
  const defaults = await session.defaults();

  const rootServer = project.rootServer ?? (await build.inferredRootServer());
  const files = await imageFiles(build, rootServer);

  const queue = await MachineQueue.locate(session.runner(), session.env);
  if (!queue) {
    throw new ExternalToolError("mq.sh", "Could not find mq.sh on PATH");
  }

  const candidates = opts.system
    ? [opts.system]
    : await queue.candidates(build.platform, build.variation);
  const system = await queue.runOnFirstAvailable(candidates, {
    exitPhrase: project.exitPhrase ?? defaults.exitPhrase,
    files,
    cwd: build.root,
  });

  console.log(`Ran ${rootServer} on ${system}`);
  return system;
}

/** x86 boots a separate kernel image ahead of the root-server image. */
export async function imageFiles(build: BuildContext, rootServer: string): Promise<string[]> {
  const files: string[] = [];
  if (architectureFamily(build.architecture) === "x86") {
    files.push(await build.kernelImagePath());
  }
  files.push(await build.imagePath(rootServer));
  return files;
}
