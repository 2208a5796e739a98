import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { ExternalToolError } from "../core/errors.js";

import { findAppPath, findOrDownload, requireAppPath, tmpAppPath } from "./apps.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "s4-apps-"));
  tempDirs.push(dir);
  return dir;
}

function writeExecutable(dir: string, name: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, "#!/bin/sh\n", { mode: 0o755 });
  return file;
}

describe("findAppPath", () => {
  it("returns the first executable match on PATH", async () => {
    const first = makeTempDir();
    const second = makeTempDir();
    fs.writeFileSync(path.join(first, "repo"), "not executable", { mode: 0o644 });
    const expected = writeExecutable(second, "repo");

    const found = await findAppPath("repo", { PATH: [first, second].join(path.delimiter) });

    expect(found).toBe(expected);
  });

  it("skips directories with the app's name", async () => {
    const bin = makeTempDir();
    fs.mkdirSync(path.join(bin, "repo"));

    expect(await findAppPath("repo", { PATH: bin })).toBeUndefined();
    await expect(requireAppPath("repo", { PATH: bin })).rejects.toThrow(
      "Could not find repo on PATH",
    );
  });
});

describe("tmpAppPath", () => {
  it("is per user inside the temp directory", () => {
    expect(tmpAppPath("repo", { tmpDir: "/tmp", user: "alice" })).toBe(
      path.join("/tmp", "alice-s4-repo"),
    );
    expect(tmpAppPath("repo", { tmpDir: "/tmp", env: { USER: "bob" } })).toBe(
      path.join("/tmp", "bob-s4-repo"),
    );
  });
});

describe("findOrDownload", () => {
  it("prefers the app on PATH without downloading", async () => {
    const bin = makeTempDir();
    const expected = writeExecutable(bin, "repo");
    const fetchMock = vi.fn<typeof fetch>();

    const found = await findOrDownload("repo", "https://example.org/repo", {
      env: { PATH: bin },
      tmpDir: makeTempDir(),
      user: "alice",
      fetch: fetchMock,
    });

    expect(found).toBe(expected);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("downloads once into the temp location and reuses the copy", async () => {
    const tmpDir = makeTempDir();
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("#!/bin/sh\necho repo\n"));
    const options = { env: { PATH: "" }, tmpDir, user: "alice", fetch: fetchMock };

    const first = await findOrDownload("repo", "https://example.org/repo", options);
    const second = await findOrDownload("repo", "https://example.org/repo", options);

    expect(first).toBe(path.join(tmpDir, "alice-s4-repo"));
    expect(second).toBe(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith("https://example.org/repo");
    expect(fs.readFileSync(first, "utf8")).toBe("#!/bin/sh\necho repo\n");
    expect(fs.statSync(first).mode & 0o777).toBe(0o755);
  });

  it("reports a failed download", async () => {
    const tmpDir = makeTempDir();
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response("missing", { status: 404 }),
    );

    const error = await findOrDownload("repo", "https://example.org/repo", {
      env: { PATH: "" },
      tmpDir,
      user: "alice",
      fetch: fetchMock,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error instanceof ExternalToolError ? error.message : "").toBe(
      "Failed to download repo from https://example.org/repo: HTTP 404",
    );
    expect(fs.existsSync(path.join(tmpDir, "alice-s4-repo"))).toBe(false);
  });
});
