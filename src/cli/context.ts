import path from "node:path";

import type { Command } from "commander";

import { loadConfig, type LoadedConfig } from "../core/config-loader.js";
import {
  commandLineFlags,
  emptyConfig,
  lookupProject,
  mergeConfig,
  resolveDefaults,
  type Config,
  type ResolvedDefaults,
} from "../core/config.js";
import { NotFoundError } from "../core/errors.js";
import type { Flag } from "../core/flag.js";
import { compareIds, type FlagId } from "../core/ids.js";
import { JsonlLogger, NullEventLog, type EventLog } from "../core/logger.js";
import { workspaceLogPath } from "../core/paths.js";
import type { Project } from "../core/project.js";
import {
  contextEasySettings,
  contextWorkspace,
  findContext,
  type BuildContext,
  type Context,
  type WorkspaceContext,
} from "../core/workspaces.js";
import { Container } from "../tools/container.js";
import { ExecaToolRunner, type ToolRunner } from "../tools/exec.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliGlobals = {
  config?: string;
  cwd?: string;
  debug?: boolean;
};

/** Seams for tests; production code leaves them unset. */
export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  home?: string;
  runner?: ToolRunner;
};

// =============================================================================
// SESSION
// =============================================================================

/**
 * Everything one CLI invocation resolves lazily and at most once: the
 * context found from the working directory, the merged config, and the
 * workspace event log.
 */
export class CliSession {
  private contextPromise?: Promise<Context | undefined>;
  private loaded?: LoadedConfig;
  private catalogConfig?: Config;
  private logger?: JsonlLogger;
  private command?: string;

  constructor(
    private readonly globals: CliGlobals,
    private readonly deps: CliDependencies = {},
  ) {}

  get cwd(): string {
    return path.resolve(this.globals.cwd ?? process.cwd());
  }

  get env(): NodeJS.ProcessEnv {
    return this.deps.env ?? process.env;
  }

  /** Record the command name and open the workspace log when inside one. */
  async start(command: string): Promise<void> {
    this.command = command;
    const context = await this.context();
    if (context) {
      this.useWorkspaceLog(contextWorkspace(context).root);
    }
  }

  close(): void {
    this.logger?.close();
    this.logger = undefined;
  }

  // ---------------------------------------------------------------------------
  // Context
  // ---------------------------------------------------------------------------

  context(): Promise<Context | undefined> {
    this.contextPromise ??= findContext(this.cwd);
    return this.contextPromise;
  }

  async requireContext(): Promise<Context> {
    const context = await this.context();
    if (!context) {
      throw new NotFoundError(
        "context",
        this.cwd,
        `No s4 workspace found at or above ${this.cwd}`,
      );
    }
    return context;
  }

  async requireWorkspace(): Promise<WorkspaceContext> {
    return contextWorkspace(await this.requireContext());
  }

  async requireBuild(): Promise<BuildContext> {
    const context = await this.requireContext();
    if (context.kind !== "build") {
      throw new NotFoundError(
        "context",
        this.cwd,
        `No s4 build directory found at or above ${this.cwd}`,
      );
    }
    return context;
  }

  // ---------------------------------------------------------------------------
  // Config
  // ---------------------------------------------------------------------------

  async loadedConfig(): Promise<LoadedConfig> {
    if (!this.loaded) {
      const context = await this.context();
      this.loaded = loadConfig({
        explicitPath: this.globals.config,
        workspaceRoot: context ? contextWorkspace(context).root : undefined,
        home: this.deps.home,
        env: this.env,
      });
    }
    return this.loaded;
  }

  async config(): Promise<Config> {
    return (await this.loadedConfig()).config;
  }

  async defaults(): Promise<ResolvedDefaults> {
    return resolveDefaults((await this.config()).defaults);
  }

  /**
   * Config with the flags declared by the workspace's easy-settings file
   * added underneath; a flag the config also declares keeps the config's entry.
   */
  async catalog(): Promise<Config> {
    if (!this.catalogConfig) {
      const config = await this.config();
      const context = await this.context();
      const easyFlags = context ? await contextEasySettings(context) : new Map<FlagId, Flag>();
      this.catalogConfig = mergeConfig({ ...emptyConfig(), flags: easyFlags }, config);
    }
    return this.catalogConfig;
  }

  async project(): Promise<Project> {
    const workspace = await this.requireWorkspace();
    return lookupProject(await this.config(), workspace.project);
  }

  /**
   * Flags that get command line options: the project's command-line flags
   * and every easy-settings flag. Empty outside a workspace.
   */
  async optionFlags(): Promise<Map<FlagId, Flag>> {
    const context = await this.context();
    if (!context) {
      return new Map();
    }

    const catalog = await this.catalog();
    const project = lookupProject(catalog, contextWorkspace(context).project);
    const flags = commandLineFlags(catalog, project);
    for (const id of (await contextEasySettings(context)).keys()) {
      const flag = catalog.flags.get(id);
      if (flag) flags.set(id, flag);
    }

    return new Map([...flags.entries()].sort(([a], [b]) => compareIds(a, b)));
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  log(): EventLog {
    return this.logger ?? new NullEventLog();
  }

  /** Switch the event log to a workspace (used right after `init` creates one). */
  useWorkspaceLog(workspaceRoot: string): EventLog {
    this.close();
    this.logger = new JsonlLogger(workspaceLogPath(workspaceRoot), { command: this.command });
    return this.logger;
  }

  runner(): ToolRunner {
    return this.deps.runner ?? new ExecaToolRunner(this.log());
  }

  async container(): Promise<Container> {
    const defaults = await this.defaults();
    return Container.detect(this.runner(), defaults.dockerImage, this.env);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function readGlobals(program: Command): CliGlobals {
  const opts = program.opts<CliGlobals>();
  return { config: opts.config, cwd: opts.cwd, debug: opts.debug };
}
