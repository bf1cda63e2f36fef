import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import { createMergeStopSignalHandler } from "./signal-handlers.js";

describe("createMergeStopSignalHandler", () => {
  it("aborts on the first stop signal and detaches every listener", () => {
    const source = new EventEmitter();
    const onSignal = vi.fn();

    const handler = createMergeStopSignalHandler({ source, onSignal });
    source.emit("SIGTERM", "SIGTERM");

    expect(handler.signal.aborted).toBe(true);
    expect(handler.signal.reason).toBe("SIGTERM");
    expect(handler.stoppedBy()).toBe("SIGTERM");
    expect(onSignal).toHaveBeenCalledWith("SIGTERM");
    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
  });

  it("leaves the signal untouched after cleanup", () => {
    const source = new EventEmitter();

    const handler = createMergeStopSignalHandler({ source, signals: ["SIGINT"] });
    handler.cleanup();
    source.emit("SIGINT", "SIGINT");

    expect(handler.signal.aborted).toBe(false);
    expect(handler.stoppedBy()).toBeNull();
    expect(source.listenerCount("SIGINT")).toBe(0);
  });
});
