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
  release_id: string;
  task?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  releaseId?: string;
  task?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Every event a release writes, in roughly the order they occur. */
export const RELEASE_EVENT_TYPES = [
  "release.start",
  "task.start",
  "task.spawned",
  "task.complete",
  "task.failed",
  "join.start",
  "join.complete",
  "cleanup.start",
  "cleanup.complete",
  "restore.start",
  "restore.complete",
  "release.complete",
  "release.failed",
] as const;

export type ReleaseEventType = (typeof RELEASE_EVENT_TYPES)[number];

/** Extra fields of a release event; `task` is the task's display label. */
export type ReleaseEventFields = JsonObject & { task?: string; ts?: string | Date };

type EventDefaults = {
  releaseId?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    options: { debug?: boolean } = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = options.debug ?? false;
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
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
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { releaseId: providedReleaseId, task, payload, ts, type, ...rest } = event;

  const releaseId = providedReleaseId ?? defaults.releaseId;
  if (!releaseId) {
    throw new Error("release_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    release_id: releaseId,
  };

  if (task) {
    result.task = task;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logReleaseEvent(
  logger: JsonlLogger,
  type: ReleaseEventType,
  fields: ReleaseEventFields = {},
): void {
  const { task, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (task !== undefined) {
    event.task = task;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
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
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  if (!stackLine) {
    return message;
  }

  return `${message}\n${stackLine.text}`;
}
