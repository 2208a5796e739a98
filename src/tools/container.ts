/*
Purpose: run commands inside the build container with the workspace, build and working directories mounted.
Assumptions: `docker` on PATH is either Docker or podman's docker shim; podman is recognised from `--version`.
*/

import path from "node:path";

import fse from "fs-extra";

import { ExternalToolError } from "../core/errors.js";
import { compareIds } from "../core/ids.js";
import { HOST_CONTAINER_DIR } from "../core/paths.js";

import { requireAppPath } from "./apps.js";
import { runChecked, type ToolInvocation, type ToolRunner } from "./exec.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContainerEngine = "docker" | "podman";

export type ContainerUser = {
  uid: number;
  gid: number;
};

export type ContainerRunOptions = {
  /** Container path to host path; host paths are canonicalised before use. */
  mounts: ReadonlyMap<string, string>;
  /** Host directory mounted at /host; defaults to the process working directory. */
  hostDir?: string;
  /** Relative paths resolve under /host. */
  workDir?: string;
  program: string[];
};

const CONTAINER_HOSTNAME = "s4";

// =============================================================================
// CONTAINER
// =============================================================================

export class Container {
  constructor(
    private readonly runner: ToolRunner,
    readonly executable: string,
    readonly engine: ContainerEngine,
    readonly image: string,
    private readonly user: ContainerUser = currentUser(),
  ) {}

  static async detect(
    runner: ToolRunner,
    image: string,
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<Container> {
    let executable: string;
    try {
      executable = await requireAppPath("docker", env);
    } catch (err) {
      throw new ExternalToolError(
        "docker",
        "docker or podman-docker must be installed",
        undefined,
        err,
      );
    }
    const engine = await detectEngine(runner, executable);
    return new Container(runner, executable, engine, image);
  }

  async runInvocation(options: ContainerRunOptions): Promise<ToolInvocation> {
    const mounts = new Map<string, string>();
    mounts.set(HOST_CONTAINER_DIR, await fse.realpath(options.hostDir ?? process.cwd()));
    for (const [containerPath, hostPath] of options.mounts) {
      mounts.set(containerPath, await fse.realpath(hostPath));
    }

    return {
      program: this.executable,
      args: buildRunArgs({
        engine: this.engine,
        user: this.user,
        image: this.image,
        mounts,
        workDir: options.workDir,
        program: options.program,
      }),
      stdio: "inherit",
    };
  }

  /** Runs interactively and returns the exit status. */
  async run(options: ContainerRunOptions): Promise<number> {
    const result = await this.runner.run(await this.runInvocation(options));
    return result.exitCode;
  }

  async runChecked(options: ContainerRunOptions): Promise<void> {
    await runChecked(this.runner, await this.runInvocation(options));
  }

  async pull(): Promise<void> {
    const result = await this.runner.run({
      program: this.executable,
      args: ["pull", this.image],
      stdio: "inherit",
    });
    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        this.executable,
        `Failed to update container image: ${this.image}`,
        result.exitCode,
      );
    }
  }
}

// =============================================================================
// PUBLIC HELPERS
// =============================================================================

export async function detectEngine(
  runner: ToolRunner,
  executable: string,
): Promise<ContainerEngine> {
  const result = await runChecked(runner, { program: executable, args: ["--version"] });
  return result.stdout.includes("podman") ? "podman" : "docker";
}

export function buildRunArgs(spec: {
  engine: ContainerEngine;
  user: ContainerUser;
  image: string;
  mounts: ReadonlyMap<string, string>;
  workDir?: string;
  program: string[];
}): string[] {
  const args = [
    "run",
    "-it",
    "--rm",
    "--hostname",
    CONTAINER_HOSTNAME,
    "--volume",
    "/etc/localtime:/etc/localtime:ro",
  ];

  if (spec.engine === "podman") {
    args.push("--userns=keep-id");
  } else {
    args.push("--user", `${spec.user.uid}:${spec.user.gid}`);
  }

  const sortedMounts = [...spec.mounts.entries()].sort(([a], [b]) => compareIds(a, b));
  for (const [containerPath, hostPath] of sortedMounts) {
    args.push("--volume", `${hostPath}:${containerPath}:z`);
  }

  args.push("--workdir", containerWorkDir(spec.workDir));
  args.push(spec.image, ...spec.program);
  return args;
}

export function containerWorkDir(workDir: string | undefined): string {
  if (workDir === undefined) {
    return HOST_CONTAINER_DIR;
  }
  return path.posix.isAbsolute(workDir) ? workDir : path.posix.join(HOST_CONTAINER_DIR, workDir);
}

// =============================================================================
// INTERNALS
// =============================================================================

function currentUser(): ContainerUser {
  return { uid: process.getuid?.() ?? 0, gid: process.getgid?.() ?? 0 };
}
