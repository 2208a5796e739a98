import { ParseError } from "./errors.js";
import type { FlagId } from "./ids.js";
import { mergeOptional, mergeSet } from "./merge.js";
import { Setting } from "./setting.js";

// =============================================================================
// TYPES
// =============================================================================

export type Repository = {
  organisation: string;
  name: string;
};

export type Project = {
  repository?: Repository;
  /** Source directory relative to the workspace root. */
  sourceDirectory?: string;
  rootServer?: string;
  exitPhrase?: string;
  /** Flags exposed as command line overrides. */
  commandLine: FlagId[];
  setting: Setting;
};

// =============================================================================
// REPOSITORY
// =============================================================================

export function parseRepository(input: string): Repository {
  const parts = input.split("/");
  if (parts.length !== 2) {
    throw new ParseError(
      "repository",
      input,
      `Invalid repository "${input}" (expected <organisation>/<name>)`,
    );
  }

  const [organisation, name] = parts;
  if (!organisation || !name) {
    throw new ParseError("repository", input, `Invalid repository "${input}": empty component`);
  }
  if (name.endsWith(".git")) {
    throw new ParseError(
      "repository",
      input,
      `Invalid repository "${input}": name must not end in .git`,
    );
  }

  return { organisation, name };
}

export function formatRepository(repository: Repository): string {
  return `${repository.organisation}/${repository.name}`;
}

export function repositoryUrl(gitServer: string, repository: Repository): string {
  return `${gitServer.replace(/\/+$/, "")}/${formatRepository(repository)}.git`;
}

// =============================================================================
// MERGE
// =============================================================================

export function mergeProject(base: Project, next: Project): Project {
  return {
    repository: mergeOptional(base.repository, next.repository),
    sourceDirectory: mergeOptional(base.sourceDirectory, next.sourceDirectory),
    rootServer: mergeOptional(base.rootServer, next.rootServer),
    exitPhrase: mergeOptional(base.exitPhrase, next.exitPhrase),
    commandLine: mergeSet(base.commandLine, next.commandLine),
    setting: base.setting.clone().merge(next.setting),
  };
}
