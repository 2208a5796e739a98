import { execa } from "execa";

import { formatErrorMessage } from "../core/error-format.js";
import { ExternalToolError } from "../core/errors.js";
import { logToolExit, logToolStart, NullEventLog, type EventLog } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolInvocation = {
  program: string;
  args: string[];
  cwd?: string;
  /** "inherit" hands the terminal to the tool; "pipe" captures its output. */
  stdio?: "inherit" | "pipe";
};

export type ToolResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** Every external process goes through a runner, one at a time. */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

// =============================================================================
// EXECA RUNNER
// =============================================================================

export class ExecaToolRunner implements ToolRunner {
  constructor(private readonly log: EventLog = new NullEventLog()) {}

  async run(invocation: ToolInvocation): Promise<ToolResult> {
    logToolStart(this.log, invocation.program, invocation.args, invocation.cwd);

    let res;
    try {
      res = await execa(invocation.program, invocation.args, {
        cwd: invocation.cwd,
        stdio: invocation.stdio ?? "pipe",
        env: process.env,
        reject: false,
      });
    } catch (err) {
      logToolExit(this.log, invocation.program, undefined);
      throw createStartError(invocation, formatErrorMessage(err), err);
    }

    logToolExit(this.log, invocation.program, res.exitCode);
    if (res.exitCode === undefined) {
      throw createStartError(invocation, "the process did not start", res);
    }

    const stdout = typeof res.stdout === "string" ? res.stdout : "";
    const stderr = typeof res.stderr === "string" ? res.stderr : "";
    return { exitCode: res.exitCode, stdout, stderr };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Run and require a zero exit status. */
export async function runChecked(
  runner: ToolRunner,
  invocation: ToolInvocation,
): Promise<ToolResult> {
  const result = await runner.run(invocation);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new ExternalToolError(
      invocation.program,
      `${formatInvocation(invocation)} exited with status ${result.exitCode}${detail ? `: ${detail}` : ""}`,
      result.exitCode,
    );
  }
  return result;
}

export function formatInvocation(invocation: ToolInvocation): string {
  return [invocation.program, ...invocation.args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : JSON.stringify(part)))
    .join(" ");
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function createStartError(
  invocation: ToolInvocation,
  detail: string,
  cause: unknown,
): ExternalToolError {
  return new ExternalToolError(
    invocation.program,
    `Failed to run ${invocation.program}: ${detail}`,
    undefined,
    cause,
  );
}
