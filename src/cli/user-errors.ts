import path from "node:path";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import {
  ConfigError,
  ExternalToolError,
  FilesystemConflictError,
  InvalidValueError,
  NotFoundError,
  ParseError,
  UnsatisfiedRequirementError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorInput,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type RenderErrorOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

/** Map `error` to a user-facing one and render it for stderr. */
export function renderCliError(error: unknown, options: RenderErrorOptions = {}): string {
  const lines = formatErrorLines(toUserFacingError(error), {
    mode: options.debug ? "debug" : "short",
  });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// DOMAIN ERROR MAPPING
// =============================================================================

/**
 * Wrap domain errors in a UserFacingError with a title and hint. Anything
 * else (including errors that are already user-facing) passes through.
 */
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof NotFoundError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.notFound,
      title: notFoundTitle(error),
      message: error.message,
      hint: notFoundHint(error),
    });
  }

  if (error instanceof UnsatisfiedRequirementError || error instanceof InvalidValueError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.requirement,
      title: "Build setting rejected.",
      message: error.message,
      hint: `Check the requirements of ${error.flag} with \`s4 info\` and adjust the flag options.`,
    });
  }

  if (error instanceof ParseError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.parse,
      title: `Invalid ${error.subject}.`,
      message: error.message,
    });
  }

  if (error instanceof FilesystemConflictError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.filesystem,
      title: "Directory conflict.",
      message: error.message,
      hint: "Choose a new path or an empty directory.",
    });
  }

  if (error instanceof ExternalToolError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.tool,
      title: `${path.basename(error.tool)} failed.`,
      message: error.message,
      hint: "Rerun with --debug to see the full error.",
    });
  }

  if (error instanceof ConfigError) {
    return fromDomainError(error, {
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      message: error.message,
    });
  }

  return error;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Label, label style and text style per line kind. Title and message have no label.
type LineLabel = { text: string; label: AnsiStyle[]; body: AnsiStyle[] };

const LINE_LABELS: Partial<Record<ErrorFormatLineKind, LineLabel>> = {
  hint: { text: "Hint:", label: ["yellow"], body: [] },
  next: { text: "Next:", label: ["cyan"], body: [] },
  code: { text: "Code:", label: ["dim"], body: ["dim"] },
  name: { text: "Name:", label: ["dim"], body: ["dim"] },
  cause: { text: "Cause:", label: ["dim"], body: ["dim"] },
};

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LINE_LABELS[line.kind];
  if (!label) {
    return line.text;
  }
  return `${format(label.text, label.label)} ${format(line.text, label.body)}`;
}

// The wrapper keeps the domain error's stack so --debug points at where it was thrown.
function fromDomainError(
  error: Error,
  input: Omit<UserFacingErrorInput, "cause">,
): UserFacingError {
  const wrapped = new UserFacingError({ ...input, cause: error });
  if (error.stack) {
    wrapped.stack = error.stack;
  }
  return wrapped;
}

function notFoundTitle(error: NotFoundError): string {
  switch (error.kind) {
    case "platform":
      return "Unknown platform.";
    case "variation":
      return "Unknown platform variation.";
    case "project":
      return "Unknown project.";
    case "image":
      return "Image not found.";
    case "system":
      return "No test system available.";
    case "context":
      return "Not in a workspace.";
  }
}

function notFoundHint(error: NotFoundError): string | undefined {
  switch (error.kind) {
    case "platform":
    case "variation":
      return "Run `s4 platforms` to list what is configured.";
    case "project":
      return "Add the project to a config file or pass --config.";
    case "image":
      return "Run `s4 compile` in the build directory first.";
    case "context":
      return "Run `s4 init` to create a workspace, or pass --cwd.";
    case "system":
      return undefined;
  }
}
