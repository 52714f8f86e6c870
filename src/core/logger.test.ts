import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logReleaseEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function makeLogPath(...segments: string[]): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, ...segments);
}

describe("JsonlLogger", () => {
  it("writes events with release and task metadata", () => {
    const logPath = makeLogPath("nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-1" });

    logger.log({ type: "task.start", task: "Git Commit", payload: { message: "hello" } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);

    const event: Record<string, unknown> = JSON.parse(lines[0]);
    expect(event.type).toBe("task.start");
    expect(event.release_id).toBe("rel-1");
    expect(event.task).toBe("Git Commit");
    expect(event.payload).toEqual({ message: "hello" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-2" });

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const events = lines.map((line): Record<string, unknown> => JSON.parse(line));

    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("logs release helpers with top-level fields", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-3" });

    logReleaseEvent(logger, "join.start", {
      running: ["Git Push: 1.2.0 to origin"],
      task: "Git Push: 1.2.0 to origin",
    });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const event: Record<string, unknown> = JSON.parse(lines[0]);

    expect(event.type).toBe("join.start");
    expect(event.release_id).toBe("rel-3");
    expect(event.task).toBe("Git Push: 1.2.0 to origin");
    expect(event.running).toEqual(["Git Push: 1.2.0 to origin"]);
  });

  it("ignores events logged after close", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-6" });

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const kept: Record<string, unknown> = JSON.parse(lines[0]);
    expect(kept.type).toBe("kept");
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-4" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const logPath = makeLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { releaseId: "rel-5" }, { debug: true });

    const writeError = new Error("disk full");
    writeError.stack = "Error: disk full\n    at fake:1:1";
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.start" });
    logger.close();

    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full\nError: disk full\n    at fake:1:1`,
    );
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, task: "Git Add" },
      { releaseId: "rel-x" },
    );

    expect(event.release_id).toBe("rel-x");
    expect(event.task).toBe("Git Add");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
  });

  it("drops empty payloads and keeps explicit timestamps", () => {
    const event = eventWithTs(
      { type: "sample", payload: {}, ts: new Date("2024-01-02T03:04:05.000Z") },
      { releaseId: "rel-y" },
    );

    expect(event).toEqual({
      type: "sample",
      ts: "2024-01-02T03:04:05.000Z",
      release_id: "rel-y",
    });
  });

  it("throws when releaseId is missing", () => {
    expect(() => eventWithTs({ type: "missing-release" })).toThrow(/release_id is required/i);
  });
});
