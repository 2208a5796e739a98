import os from "node:os";
import path from "node:path";

import { userConfigPaths, workspaceConfigPath } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "home" | "workspace" | "explicit";

export type ConfigCandidate = {
  path: string;
  source: ConfigSource;
  /** Required candidates must exist; the others are skipped when missing. */
  required: boolean;
};

export type ConfigSearchOptions = {
  explicitPath?: string;
  workspaceRoot?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Override documents in merge order; later entries win. */
export function discoverConfigFiles(options: ConfigSearchOptions = {}): ConfigCandidate[] {
  const home = options.home ?? os.homedir();
  const candidates: ConfigCandidate[] = userConfigPaths(options.env ?? process.env, home).map(
    (candidate) => ({ path: candidate, source: "home", required: false }),
  );

  if (options.workspaceRoot) {
    candidates.push({
      path: workspaceConfigPath(path.resolve(options.workspaceRoot)),
      source: "workspace",
      required: false,
    });
  }

  if (options.explicitPath) {
    candidates.push({ path: path.resolve(options.explicitPath), source: "explicit", required: true });
  }

  return dedupe(candidates);
}

// =============================================================================
// INTERNALS
// =============================================================================

// A workspace in the home directory, or --config pointing at a user file, names
// the same file twice; the later (stronger) occurrence is kept.
function dedupe(candidates: ConfigCandidate[]): ConfigCandidate[] {
  const seen = new Set<string>();
  const kept: ConfigCandidate[] = [];
  for (const candidate of [...candidates].reverse()) {
    if (seen.has(candidate.path)) continue;
    seen.add(candidate.path);
    kept.unshift(candidate);
  }
  return kept;
}
