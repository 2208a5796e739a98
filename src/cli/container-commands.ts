import { contextMounts } from "../core/workspaces.js";
import { ninja } from "../tools/cmake.js";

import type { CliSession } from "./context.js";

// =============================================================================
// CONTAINER COMMANDS
// =============================================================================

export async function compileCommand(session: CliSession): Promise<void> {
  const build = await session.requireBuild();
  await ninja(await session.container(), build, session.cwd);
}

/** Interactive command (default `bash`) with the context mounted; returns its exit status. */
export async function shellCommand(session: CliSession, program: string[]): Promise<number> {
  const context = await session.requireContext();
  const container = await session.container();
  return container.run({
    mounts: contextMounts(context),
    hostDir: session.cwd,
    program: program.length > 0 ? program : ["bash"],
  });
}

export async function updateImageCommand(session: CliSession): Promise<void> {
  const container = await session.container();
  await container.pull();
  console.log(`Updated ${container.image}`);
}
