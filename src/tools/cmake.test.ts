import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { FakeToolRunner } from "../__tests__/helpers/fake-tool-runner.js";
import { parseConfigDocument } from "../core/config-loader.js";
import { UnsatisfiedRequirementError } from "../core/errors.js";
import { flagId, platformId, projectId } from "../core/ids.js";
import { readBuildMarker } from "../core/markers.js";
import { Setting } from "../core/setting.js";
import { BuildContext, WorkspaceContext } from "../core/workspaces.js";

import { initBuild, initialCmakeArgs, ninja, updateBuild, updateCmakeArgs } from "./cmake.js";
import { Container } from "./container.js";

const config = parseConfigDocument(
  `
flag:
  smp:
    variable: SMP
  mcs:
    variable: KernelIsMCS
    requires:
      - can-mcs: true
  can-mcs: {}
  platform:
    variable: PLATFORM
platform:
  board:
    architectures: [aarch64]
project:
  demo: {}
`,
  "cmake.test.yaml",
);

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

async function createBuild(): Promise<BuildContext> {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "s4-cmake-")));
  tempDirs.push(dir);
  const workspace = await WorkspaceContext.create(projectId("demo"), path.join(dir, "ws"));
  return BuildContext.create(config, workspace, {
    platform: platformId("board"),
    architecture: "aarch64",
    setting: Setting.empty().setBool(flagId("smp"), true),
    path: path.join(workspace.root, "build"),
  });
}

function containerFor(runner: FakeToolRunner): Container {
  return new Container(runner, "docker", "docker", "example/build", { uid: 1000, gid: 1000 });
}

describe("cmake arguments", () => {
  it("configures from the source tree with the cached settings file", async () => {
    const build = await createBuild();

    expect(initialCmakeArgs(config, build, path.join("projects", "demo"))).toEqual([
      "-DPLATFORM=board",
      "-DSMP=ON",
      "-G",
      "Ninja",
      "-DSEL4_CACHE_DIR=/workspace/.s4_cache",
      "-B",
      "/build",
      "-S",
      "/workspace/projects/demo",
      "-C",
      "/workspace/projects/demo/settings.cmake",
    ]);
  });

  it("reconfigures the existing build directory", async () => {
    const build = await createBuild();

    expect(updateCmakeArgs(config, build)).toEqual(["-DPLATFORM=board", "-DSMP=ON", "/build"]);
  });
});

describe("running cmake and ninja", () => {
  it("saves the setting and runs cmake in the build directory", async () => {
    const build = await createBuild();
    const runner = new FakeToolRunner();
    build.updateSetting(Setting.empty().setBool(flagId("smp"), false));

    await updateBuild({ config, container: containerFor(runner), build });

    const marker = await readBuildMarker(build.root);
    expect(marker.setting.get(flagId("smp"))).toEqual({ kind: "boolean", value: false });

    const args = runner.calls[0]?.args ?? [];
    expect(args).toContain(`${build.root}:/build:z`);
    expect(args.slice(args.indexOf("--workdir"))).toEqual([
      "--workdir",
      "/build",
      "example/build",
      "cmake",
      "-DPLATFORM=board",
      "-DSMP=OFF",
      "/build",
    ]);
  });

  it("mounts the given host directory at /host", async () => {
    const build = await createBuild();
    const hostDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "s4-host-")));
    tempDirs.push(hostDir);
    const runner = new FakeToolRunner();

    await updateBuild({ config, container: containerFor(runner), build, hostDir });
    await ninja(containerFor(runner), build, hostDir);

    for (const call of runner.calls) {
      expect(call.args).toContain(`${hostDir}:/host:z`);
    }
    expect(runner.calls).toHaveLength(2);
  });

  it("refuses to configure an invalid setting", async () => {
    const build = await createBuild();
    const runner = new FakeToolRunner();
    build.updateSetting(Setting.empty().setBool(flagId("mcs"), true));

    await expect(
      initBuild({ config, container: containerFor(runner), build }, "projects/demo"),
    ).rejects.toThrow(UnsatisfiedRequirementError);
    expect(runner.calls).toEqual([]);
    expect((await readBuildMarker(build.root)).setting.get(flagId("mcs"))).toBeUndefined();
  });

  it("surfaces a failing ninja run", async () => {
    const build = await createBuild();
    const runner = new FakeToolRunner(() => ({ exitCode: 1, stderr: "ninja: build stopped" }));

    await expect(ninja(containerFor(runner), build)).rejects.toThrow("ninja: build stopped");
    expect(runner.calls[0]?.args.slice(-2)).toEqual(["example/build", "ninja"]);
  });
});
