import type { ResolvedDefaults } from "../core/config.js";
import { repositoryUrl, type Repository } from "../core/project.js";

import { findOrDownload, type AppLookupOptions } from "./apps.js";
import { runChecked, type ToolInvocation, type ToolRunner } from "./exec.js";

/** Checkout of a project's manifest with the `repo` tool. */
export class ManifestTool {
  constructor(
    private readonly runner: ToolRunner,
    readonly executable: string,
    private readonly defaults: ResolvedDefaults,
  ) {}

  static async locate(
    runner: ToolRunner,
    defaults: ResolvedDefaults,
    options: AppLookupOptions = {},
  ): Promise<ManifestTool> {
    const executable = await findOrDownload("repo", defaults.repoUrl, options);
    return new ManifestTool(runner, executable, defaults);
  }

  initInvocation(repository: Repository, workspaceRoot: string): ToolInvocation {
    const args = ["init", "--manifest-url", repositoryUrl(this.defaults.gitServer, repository)];
    if (this.defaults.repoBranch) {
      args.push("--manifest-branch", this.defaults.repoBranch);
    }
    if (this.defaults.repoManifest) {
      args.push("--manifest-name", this.defaults.repoManifest);
    }
    return { program: this.executable, args, cwd: workspaceRoot, stdio: "inherit" };
  }

  syncInvocation(workspaceRoot: string): ToolInvocation {
    return { program: this.executable, args: ["sync"], cwd: workspaceRoot, stdio: "inherit" };
  }

  /** `repo init` then `repo sync` in the workspace root. */
  async checkout(repository: Repository, workspaceRoot: string): Promise<void> {
    await runChecked(this.runner, this.initInvocation(repository, workspaceRoot));
    await runChecked(this.runner, this.syncInvocation(workspaceRoot));
  }
}
