/*
Purpose: append build events to a JSONL file, one fsync'd line per event.
Assumptions: a single build writes to the file at a time; lines from earlier runs stay.
Usage: const log = new JsonlLogger(file, { runId }); log.log({ type: "build.start" }); log.close();
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type BuildEvent = {
  ts: string;
  type: string;
  run_id: string;
  payload?: JsonObject;
};

export type BuildEventInput = {
  type: string;
  payload?: JsonObject;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fd: number;
  private closed = false;

  constructor(
    readonly filePath: string,
    private readonly context: { runId: string },
    private readonly debug = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(input: BuildEventInput): void {
    if (this.closed) return;
    const line = `${JSON.stringify(toBuildEvent(input, this.context.runId))}\n`;
    try {
      fs.writeSync(this.fd, line);
      fs.fsyncSync(this.fd);
    } catch (err) {
      console.warn(this.failureWarning(`write log event to ${this.filePath}`, err));
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.fd);
    } catch (err) {
      console.warn(this.failureWarning(`close log file ${this.filePath}`, err));
    }
  }

  private failureWarning(action: string, error: unknown): string {
    const warning = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
    if (!this.debug) return warning;

    const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
    return stack ? `${warning}\n${stack.text}` : warning;
  }
}

// =============================================================================
// EVENTS
// =============================================================================

export function toBuildEvent(input: BuildEventInput, runId: string): BuildEvent {
  const event: BuildEvent = { ts: isoNow(), type: input.type, run_id: runId };
  if (input.payload && Object.keys(input.payload).length > 0) {
    event.payload = input.payload;
  }
  return event;
}

// A build without --log-file has no logger.
export function logBuildEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload: JsonObject = {},
): void {
  logger?.log({ type, payload });
}
