import path from "node:path";

import { sortedPlatforms, type Config } from "../core/config.js";
import { compareIds } from "../core/ids.js";
import { formatPlatformChoice } from "../core/platform.js";
import { formatValue } from "../core/value.js";
import { contextWorkspace, type BuildContext, type Context } from "../core/workspaces.js";

import type { CliSession } from "./context.js";

// =============================================================================
// INFO
// =============================================================================

export async function infoCommand(session: CliSession): Promise<void> {
  const context = await session.requireContext();
  const { sources } = await session.loadedConfig();
  for (const line of await describeContext(context, sources)) {
    console.log(line);
  }
}

export async function describeContext(
  context: Context,
  configSources: string[],
): Promise<string[]> {
  const workspace = contextWorkspace(context);
  const lines = [`Workspace: ${workspace.root}`, `Project: ${workspace.project}`];

  if (context.kind === "build") {
    lines.push(
      `Build: ${context.root}`,
      `Platform: ${describePlatform(context)}`,
      `Architecture: ${context.architecture}`,
    );
  }

  const sources = configSources.length > 0 ? configSources.join(", ") : "built-in only";
  lines.push(`Config files: ${sources}`);

  if (context.kind === "build") {
    lines.push("Setting:");
    for (const [id, value] of context.setting.entries()) {
      lines.push(`  ${id} = ${formatValue(value)}`);
    }
  }

  const builds = await workspace.builds();
  lines.push(builds.length > 0 ? "Builds:" : "Builds: none");
  for (const build of builds) {
    const relative = path.relative(workspace.root, build.root) || ".";
    lines.push(`  ${relative} (${describePlatform(build)}, ${build.architecture})`);
  }

  return lines;
}

// =============================================================================
// PLATFORMS
// =============================================================================

export async function platformsCommand(session: CliSession): Promise<void> {
  for (const line of formatPlatformList(await session.config())) {
    console.log(line);
  }
}

/** One line per platform, with its variations indented beneath it. */
export function formatPlatformList(config: Config): string[] {
  const lines: string[] = [];
  for (const [id, platform] of sortedPlatforms(config)) {
    const architectures =
      platform.architectures.length > 0 ? platform.architectures.join(", ") : "-";
    lines.push(`${id} (${architectures})`);

    const variations = [...platform.variations.keys()].sort(compareIds);
    if (variations.length > 0) {
      lines.push(`  variations: ${variations.join(", ")}`);
    }
  }
  return lines;
}

function describePlatform(build: BuildContext): string {
  return formatPlatformChoice({ platform: build.platform, variation: build.variation });
}
