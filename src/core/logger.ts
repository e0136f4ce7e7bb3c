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
  session_id: string;
  task_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  sessionId?: string;
  taskId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  sessionId?: string;
};

type LogFailureAction = "write" | "close";

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly isDebugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
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
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// Collects events in memory; used where no session log file is wanted.
export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = {}) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }

  close(): void {}
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { sessionId: providedSessionId, taskId, payload, ts, type } = event;

  const sessionId = providedSessionId ?? defaults.sessionId;
  if (!sessionId) {
    throw new Error("session_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    session_id: sessionId,
  };

  if (taskId) {
    result.task_id = taskId;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logTaskEvent(
  logger: EventLogger,
  type: string,
  taskId: string,
  payload: JsonObject = {},
): void {
  logger.log({ type, taskId, payload });
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

  const stackLine = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
