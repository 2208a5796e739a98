import path from "node:path";

import { parseArchitecture, type Architecture } from "../core/architecture.js";
import { checkSetting, lookupPlatform, type Config } from "../core/config.js";
import { ParseError } from "../core/errors.js";
import type { PlatformId } from "../core/ids.js";
import { formatPlatformChoice, parsePlatformChoice } from "../core/platform.js";
import type { Setting } from "../core/setting.js";
import { BuildContext, inferredSource, type Context } from "../core/workspaces.js";
import { initBuild, updateBuild } from "../tools/cmake.js";

import type { CliSession } from "./context.js";

// =============================================================================
// BUILD
// =============================================================================

export type BuildCommandOptions = {
  platform: string;
  arch?: string;
  configure: boolean;
};

export async function buildCommand(
  session: CliSession,
  directory: string,
  opts: BuildCommandOptions,
  overrides: Setting,
): Promise<BuildContext> {
  const workspace = await session.requireWorkspace();
  const config = await session.catalog();

  const choice = parsePlatformChoice(opts.platform);
  const architecture = resolveArchitecture(config, choice.platform, opts.arch);

  const build = await BuildContext.create(
    config,
    workspace,
    {
      platform: choice.platform,
      variation: choice.variation,
      architecture,
      setting: overrides,
      path: path.resolve(session.cwd, directory),
    },
    session.log(),
  );
  console.log(
    `Created ${formatPlatformChoice(choice)} (${architecture}) build at ${build.root}`,
  );

  if (!opts.configure) {
    checkSetting(config, build.setting);
    return build;
  }

  const container = await session.container();
  await initBuild(
    { config, container, build, hostDir: session.cwd, log: session.log() },
    await sourceDirectory(session, build),
  );
  return build;
}

// =============================================================================
// CONFIGURE
// =============================================================================

export async function configureCommand(
  session: CliSession,
  overrides: Setting,
): Promise<BuildContext> {
  const build = await session.requireBuild();
  const config = await session.catalog();

  build.updateSetting(overrides);
  const container = await session.container();
  await updateBuild({ config, container, build, hostDir: session.cwd, log: session.log() });
  return build;
}

// =============================================================================
// INTERNALS
// =============================================================================

/** `-a` may be left out when the platform supports exactly one architecture. */
export function resolveArchitecture(
  config: Config,
  platform: PlatformId,
  arch: string | undefined,
): Architecture {
  if (arch !== undefined) {
    return parseArchitecture(arch);
  }

  const supported = lookupPlatform(config, platform).architectures;
  const [only] = supported;
  if (supported.length === 1 && only !== undefined) {
    return only;
  }

  const listed = supported.length > 0 ? supported.join(", ") : "no listed architectures";
  throw new ParseError(
    "architecture",
    "",
    `Platform ${platform} supports ${listed}; pass -a <architecture>`,
  );
}

async function sourceDirectory(session: CliSession, context: Context): Promise<string> {
  const project = await session.project();
  return project.sourceDirectory ?? inferredSource(context);
}
