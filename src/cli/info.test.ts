import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseConfigDocument } from "../core/config-loader.js";
import { ParseError } from "../core/errors.js";
import { flagId, platformId, projectId, variationId } from "../core/ids.js";
import { Setting } from "../core/setting.js";
import { BuildContext, WorkspaceContext } from "../core/workspaces.js";

import { resolveArchitecture } from "./build.js";
import { describeContext, formatPlatformList } from "./info.js";

const config = parseConfigDocument(
  `
platform:
  zynq:
    architectures: [aarch32, aarch64]
    variation:
      ultra: {}
      mini: {}
  virt: {}
  board:
    architectures: [riscv64]
project:
  demo: {}
`,
  "info.test.yaml",
);

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "s4-info-")));
  tempDirs.push(dir);
  return dir;
}

describe("formatPlatformList", () => {
  it("lists platforms in order with architectures and variations", () => {
    expect(formatPlatformList(config)).toEqual([
      "board (riscv64)",
      "virt (-)",
      "zynq (aarch32, aarch64)",
      "  variations: mini, ultra",
    ]);
  });
});

describe("resolveArchitecture", () => {
  it("uses the only architecture of a platform", () => {
    expect(resolveArchitecture(config, platformId("board"), undefined)).toBe("riscv64");
  });

  it("parses an explicit architecture", () => {
    expect(resolveArchitecture(config, platformId("zynq"), "aarch32")).toBe("aarch32");
    expect(() => resolveArchitecture(config, platformId("zynq"), "mips")).toThrow(ParseError);
  });

  it("asks for -a when the platform supports several", () => {
    expect(() => resolveArchitecture(config, platformId("zynq"), undefined)).toThrow(
      "Platform zynq supports aarch32, aarch64; pass -a <architecture>",
    );
    expect(() => resolveArchitecture(config, platformId("virt"), undefined)).toThrow(
      "Platform virt supports no listed architectures; pass -a <architecture>",
    );
  });
});

describe("describeContext", () => {
  it("describes a workspace without builds", async () => {
    const workspace = await WorkspaceContext.create(projectId("demo"), makeTempDir());

    expect(await describeContext(workspace, [])).toEqual([
      `Workspace: ${workspace.root}`,
      "Project: demo",
      "Config files: built-in only",
      "Builds: none",
    ]);
  });

  it("describes a build with its setting and sibling builds", async () => {
    const workspace = await WorkspaceContext.create(projectId("demo"), makeTempDir());
    const build = await BuildContext.create(config, workspace, {
      platform: platformId("zynq"),
      variation: variationId("ultra"),
      architecture: "aarch64",
      setting: Setting.empty().setBool(flagId("smp"), true),
      path: path.join(workspace.root, "zynq"),
    });

    expect(await describeContext(build, ["/etc/s4.yaml"])).toEqual([
      `Workspace: ${workspace.root}`,
      "Project: demo",
      `Build: ${build.root}`,
      "Platform: zynq:ultra",
      "Architecture: aarch64",
      "Config files: /etc/s4.yaml",
      "Setting:",
      '  architecture = "arm"',
      '  kernel-platform = "zynq"',
      '  platform = "ultra"',
      '  sel4-architecture = "aarch64"',
      "  smp = true",
      "Builds:",
      "  zynq (zynq:ultra, aarch64)",
    ]);
  });
});
