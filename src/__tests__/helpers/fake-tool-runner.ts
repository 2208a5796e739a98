import type { ToolInvocation, ToolResult, ToolRunner } from "../../tools/exec.js";

type Responder = (invocation: ToolInvocation) => Partial<ToolResult> | undefined;

/**
 * In-process runner for tests: records every invocation and answers from
 * `respond`, defaulting to a silent success.
 */
export class FakeToolRunner implements ToolRunner {
  readonly calls: ToolInvocation[] = [];

  constructor(private readonly respond: Responder = () => undefined) {}

  async run(invocation: ToolInvocation): Promise<ToolResult> {
    this.calls.push(invocation);
    const result = this.respond(invocation) ?? {};
    return {
      exitCode: result.exitCode ?? 0,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  }
}
