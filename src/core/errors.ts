export class S4Error extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "S4Error";
  }
}

export class ConfigError extends S4Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type NotFoundKind = "platform" | "variation" | "project" | "image" | "system" | "context";

export class NotFoundError extends S4Error {
  constructor(
    public readonly kind: NotFoundKind,
    public readonly id: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "NotFoundError";
  }
}

export class UnsatisfiedRequirementError extends S4Error {
  constructor(public readonly flag: string) {
    super(`None of the requirement sets for the flag ${flag} could be satisfied`);
    this.name = "UnsatisfiedRequirementError";
  }
}

export class InvalidValueError extends S4Error {
  constructor(
    public readonly flag: string,
    public readonly value: string,
  ) {
    super(`Cannot set flag ${flag} with requirements to non-boolean value "${value}"`);
    this.name = "InvalidValueError";
  }
}

export class ParseError extends S4Error {
  constructor(
    public readonly subject: string,
    public readonly input: string,
    message?: string,
  ) {
    super(message ?? `Invalid ${subject}: "${input}"`);
    this.name = "ParseError";
  }
}

export class FilesystemConflictError extends S4Error {
  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "FilesystemConflictError";
  }
}

export class ExternalToolError extends S4Error {
  constructor(
    public readonly tool: string,
    message: string,
    public readonly exitCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ExternalToolError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  notFound: "NOT_FOUND",
  requirement: "REQUIREMENT_ERROR",
  parse: "PARSE_ERROR",
  filesystem: "FILESYSTEM_ERROR",
  tool: "TOOL_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
