import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  JsonlLogger,
  eventWithTs,
  logMarkerWrite,
  logToolExit,
  logToolStart,
  resolveDebugFlagFromArgv,
  type LogEventInput,
} from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with the command name", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "s4.jsonl");
    const logger = new JsonlLogger(logPath, { command: "build" });

    logger.log({ type: "workspace.create", payload: { project: "demo" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);

    const [event] = events;
    expect(event.type).toBe("workspace.create");
    expect(event.command).toBe("build");
    expect(event.payload).toEqual({ project: "demo" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "s4.jsonl");

    const first = new JsonlLogger(logPath);
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath);
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("records tool and marker events", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "s4.jsonl");
    const logger = new JsonlLogger(logPath, { command: "compile" });

    logToolStart(logger, "docker", ["run", "--rm"], "/work");
    logToolExit(logger, "docker", undefined);
    logMarkerWrite(logger, "build", "/work/build/.s4-build.yaml");
    logger.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["tool.start", "tool.exit", "build.save"]);
    expect(events[0].payload).toEqual({ tool: "docker", args: ["run", "--rm"], cwd: "/work" });
    expect(events[1].payload).toEqual({ tool: "docker", exit_code: null });
    expect(events[2].payload).toEqual({ path: "/work/build/.s4-build.yaml" });
  });

  it("ignores events after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "s4.jsonl");
    const logger = new JsonlLogger(logPath);

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "s4.jsonl");
    const logger = new JsonlLogger(logPath);

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "tool.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const originalArgv = [...process.argv];
    process.argv = [...process.argv, "--debug"];

    try {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
      const logPath = path.join(tmpDir, "s4.jsonl");
      const logger = new JsonlLogger(logPath);

      const writeError = new Error("disk full");
      vi.spyOn(fs, "writeSync").mockImplementation(() => {
        throw writeError;
      });
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      logger.log({ type: "tool.start" });
      logger.close();

      expect(warnSpy).toHaveBeenCalledTimes(1);
      const message = warnSpy.mock.calls[0]?.[0];
      expect(message).toContain("disk full");
      if (writeError.stack) {
        expect(message).toContain(writeError.stack);
      }
    } finally {
      process.argv = originalArgv;
    }
  });
});

describe("eventWithTs", () => {
  it("fills the command from defaults and keeps an explicit timestamp", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, ts: new Date("2024-05-01T10:00:00Z") },
      { command: "info" },
    );

    expect(event).toEqual({
      ts: "2024-05-01T10:00:00.000Z",
      type: "sample",
      command: "info",
      payload: { key: "value" },
    });
  });

  it("prefers the event's own command and drops an empty payload", () => {
    const input: LogEventInput = { type: "sample", command: "run", payload: {}, ts: "t0" };

    expect(eventWithTs(input, { command: "info" })).toEqual({
      ts: "t0",
      type: "sample",
      command: "run",
    });
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("takes the last debug flag before the separator", () => {
    expect(resolveDebugFlagFromArgv(["s4", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["s4", "--debug", "--", "--no-debug"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["s4", "info"])).toBeUndefined();
  });
});
