import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { ExternalToolError } from "../core/errors.js";
import { isFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppLookupOptions = {
  env?: NodeJS.ProcessEnv;
  tmpDir?: string;
  user?: string;
  fetch?: typeof fetch;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** First executable named `app` on PATH. */
export async function findAppPath(
  app: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | undefined> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, app);
    if ((await isFile(candidate)) && (await isExecutable(candidate))) {
      return candidate;
    }
  }
  return undefined;
}

export async function requireAppPath(
  app: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const found = await findAppPath(app, env);
  if (!found) {
    throw new ExternalToolError(app, `Could not find ${app} on PATH`);
  }
  return found;
}

/** Per-user location for helpers downloaded on demand. */
export function tmpAppPath(app: string, options: AppLookupOptions = {}): string {
  const tmpDir = options.tmpDir ?? os.tmpdir();
  const user = options.user ?? resolveUserName(options.env ?? process.env);
  return path.join(tmpDir, `${user}-s4-${app}`);
}

/**
 * Use `app` from PATH, else a copy downloaded earlier, else download it from
 * `url` into the per-user temp location.
 */
export async function findOrDownload(
  app: string,
  url: string,
  options: AppLookupOptions = {},
): Promise<string> {
  const onPath = await findAppPath(app, options.env ?? process.env);
  if (onPath) {
    return onPath;
  }

  const target = tmpAppPath(app, options);
  if (await isFile(target)) {
    return target;
  }

  await download(app, url, target, options.fetch ?? fetch);
  return target;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function download(
  app: string,
  url: string,
  target: string,
  fetchImpl: typeof fetch,
): Promise<void> {
  let body: ArrayBuffer;
  try {
    const response = await fetchImpl(url);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    body = await response.arrayBuffer();
  } catch (err) {
    throw new ExternalToolError(
      app,
      `Failed to download ${app} from ${url}: ${formatErrorMessage(err)}`,
      undefined,
      err,
    );
  }

  const partial = `${target}.download`;
  await fse.ensureDir(path.dirname(target));
  await fse.writeFile(partial, Buffer.from(body), { mode: 0o755 });
  await fse.chmod(partial, 0o755);
  await fse.rename(partial, target);
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await fse.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function resolveUserName(env: NodeJS.ProcessEnv): string {
  const fromEnv = env.USER ?? env.USERNAME;
  if (fromEnv) {
    return fromEnv;
  }
  return os.userInfo().username;
}
