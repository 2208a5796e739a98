import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  command?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  command?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  command?: string;
};

type LogFailureAction = "open" | "write" | "close";

/** Where tool invocations and marker writes are recorded. */
export interface EventLog {
  log(event: LogEventInput): void;
}

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Append-only JSONL log. Failing to open or write the file only warns; the
 * command being logged carries on.
 */
export class JsonlLogger implements EventLog {
  private fileDescriptor: number | null = null;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    this.isDebugEnabled = resolveLoggerDebugEnabled();
    try {
      fse.ensureDirSync(path.dirname(filePath));
      this.fileDescriptor = fs.openSync(filePath, "a");
    } catch (err) {
      console.warn(formatLogFailureWarning("open", this.filePath, err, this.isDebugEnabled));
      this.closed = true;
    }
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed || this.fileDescriptor === null) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed || this.fileDescriptor === null) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

/** Used before a workspace exists, and in tests. */
export class NullEventLog implements EventLog {
  log(_event: LogEventInput): void {}
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { command: providedCommand, payload, ts, type } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type };

  const command = providedCommand ?? defaults.command;
  if (command) {
    result.command = command;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logToolStart(log: EventLog, tool: string, args: string[], cwd?: string): void {
  const payload: JsonObject = { tool, args };
  if (cwd) payload.cwd = cwd;
  log.log({ type: "tool.start", payload });
}

export function logToolExit(log: EventLog, tool: string, exitCode: number | undefined): void {
  log.log({ type: "tool.exit", payload: { tool, exit_code: exitCode ?? null } });
}

export function logMarkerWrite(
  log: EventLog,
  kind: "workspace" | "build",
  markerPath: string,
): void {
  log.log({ type: `${kind}.save`, payload: { path: markerPath } });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write"
      ? `write log event to ${filePath}`
      : action === "open"
        ? `open log file ${filePath}`
        : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
