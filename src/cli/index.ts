import { Command } from "commander";

import { buildCommand, configureCommand, type BuildCommandOptions } from "./build.js";
import { compileCommand, shellCommand, updateImageCommand } from "./container-commands.js";
import { CliSession, readGlobals, type CliDependencies } from "./context.js";
import { readFlagOptions, registerFlagOptions, type FlagOptionBinding } from "./flags.js";
import { infoCommand, platformsCommand } from "./info.js";
import { initCommand } from "./init.js";
import { runCommand } from "./run.js";

// Commands whose options include one per build flag.
const FLAG_COMMANDS = new Set(["build", "configure"]);

export function buildCli(deps: CliDependencies = {}): Command {
  const program = new Command();

  let session: CliSession | undefined;
  const getSession = (): CliSession => {
    session ??= new CliSession(readGlobals(program), deps);
    return session;
  };

  const withSession =
    <A extends unknown[]>(name: string, fn: (session: CliSession, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      const current = getSession();
      try {
        await current.start(name);
        await fn(current, ...args);
      } finally {
        current.close();
      }
    };

  let flagBindings: FlagOptionBinding[] = [];

  program
    .name("s4")
    .description("Workspace, build configuration and hardware test runner for seL4 projects")
    .version("0.1.0")
    .option("--config <path>", "Extra config file merged over the discovered ones")
    .option("--cwd <dir>", "Run as if started in <dir>")
    .option("--debug", "Show error details and stack traces")
    .enablePositionalOptions();

  // Global options are parsed by now; the flag options depend on the
  // workspace they point at, so they are added just before dispatch.
  program.hook("preSubcommand", async (_program, subcommand) => {
    if (FLAG_COMMANDS.has(subcommand.name())) {
      flagBindings = registerFlagOptions(subcommand, await getSession().optionFlags());
    }
  });

  program
    .command("init")
    .description("Create a workspace for a project and check out its sources")
    .argument("<project>", "Project name from the config")
    .argument("[directory]", "Workspace directory (default: ./<project>)")
    .option("--no-sync", "Create the workspace without running repo init/sync")
    .action(
      withSession(
        "init",
        async (
          current: CliSession,
          project: string,
          directory: string | undefined,
          opts: { sync: boolean },
        ) => {
          await initCommand(current, project, { directory, sync: opts.sync });
        },
      ),
    );

  program
    .command("build")
    .description("Create a build directory for a platform and configure it")
    .argument("<directory>", "Build directory to create")
    .requiredOption("-p, --platform <platform>", "Platform, or <platform>:<variation>")
    .option("-a, --arch <architecture>", "Target architecture")
    .option("--no-configure", "Create the build without running cmake")
    .action(
      withSession(
        "build",
        async (current: CliSession, directory: string, opts: BuildCommandOptions) => {
          await buildCommand(current, directory, opts, readFlagOptions(opts, flagBindings));
        },
      ),
    );

  program
    .command("configure")
    .description("Change build flags and rerun cmake in the current build")
    .action(
      withSession("configure", async (current: CliSession, opts: Record<string, unknown>) => {
        await configureCommand(current, readFlagOptions(opts, flagBindings));
      }),
    );

  program
    .command("compile")
    .description("Run ninja in the current build")
    .action(
      withSession("compile", async (current: CliSession) => {
        await compileCommand(current);
      }),
    );

  program
    .command("run")
    .description("Run the current build's images on a test system")
    .option("-s, --system <name>", "Run on this system or pool instead of matching one")
    .action(
      withSession("run", async (current: CliSession, opts: { system?: string }) => {
        await runCommand(current, { system: opts.system });
      }),
    );

  program
    .command("shell")
    .description("Run a command (default: bash) in the build container")
    .argument("[command...]", "Command and arguments")
    .passThroughOptions()
    .action(
      withSession("shell", async (current: CliSession, command: string[]) => {
        process.exitCode = await shellCommand(current, command);
      }),
    );

  program
    .command("update-image")
    .description("Pull the latest build container image")
    .action(
      withSession("update-image", async (current: CliSession) => {
        await updateImageCommand(current);
      }),
    );

  program
    .command("info")
    .description("Show the current workspace or build")
    .action(
      withSession("info", async (current: CliSession) => {
        await infoCommand(current);
      }),
    );

  program
    .command("platforms")
    .description("List configured platforms and their variations")
    .action(
      withSession("platforms", async (current: CliSession) => {
        await platformsCommand(current);
      }),
    );

  return program;
}
