/*
Purpose: structured JSONL event logging for merge runs.
Assumptions: one event per line; callers emit through logEngineEvent so every event carries ts/type/run_id.
Usage: const log = new JsonlLogger(path, { runId }); logEngineEvent(log, "merge.complete", { declarations: 12 }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface EventLogger {
  readonly runId: string;
  log(event: JsonObject): void;
}

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  public readonly runId: string;
  private directoryReady = false;

  constructor(
    public readonly filePath: string,
    opts: { runId: string },
  ) {
    this.runId = opts.runId;
  }

  log(event: JsonObject): void {
    if (!this.directoryReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify(event)}\n`, "utf8");
  }
}

export class MemoryLogger implements EventLogger {
  public readonly events: JsonObject[] = [];

  constructor(public readonly runId: string = "memory") {}

  log(event: JsonObject): void {
    this.events.push(event);
  }

  eventsOfType(type: string): JsonObject[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function logEngineEvent(logger: EventLogger, type: string, payload: JsonObject = {}): void {
  logger.log({ ts: isoNow(), type, run_id: logger.runId, ...payload });
}
