import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function isDirectory(p: string): Promise<boolean> {
  if (!(await fse.pathExists(p))) return false;
  return (await fse.stat(p)).isDirectory();
}

export async function isFile(p: string): Promise<boolean> {
  if (!(await fse.pathExists(p))) return false;
  return (await fse.stat(p)).isFile();
}

/**
 * Relative path from `from` to `to`, comparing canonical (symlink-resolved)
 * paths. Both must exist.
 */
export async function relativePath(from: string, to: string): Promise<string> {
  const [fromReal, toReal] = await Promise.all([fse.realpath(from), fse.realpath(to)]);
  return path.relative(fromReal, toReal) || ".";
}
