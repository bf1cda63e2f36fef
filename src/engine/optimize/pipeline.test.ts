import { describe, expect, it } from "vitest";

import { ConfigError } from "../../core/errors.js";
import { MemoryLogger } from "../../core/logger.js";
import { mergedDeclaration } from "../engine.test-helpers.js";
import { MergeAbortedError, PassTimeoutError } from "../errors.js";
import type { MergedUnit } from "../model/schema.js";

import { runOptimizationPipeline, validatePassSelection } from "./pipeline.js";
import type { OptimizationPass, OptimizationPassName } from "./types.js";

const UNIT: MergedUnit = {
  declarations: [
    mergedDeclaration({ id: 0, name: "main", exported: true, text: "function main() { return 2 * 21; }" }),
    mergedDeclaration({ id: 1, name: "unused", text: "function unused() {}" }),
  ],
  imports: [],
  aliases: [],
  libraries: [],
  notices: [],
  profile: null,
};

function recordingPass(name: OptimizationPassName, calls: string[]): OptimizationPass {
  return {
    name,
    transform: async (unit) => {
      calls.push(name);
      return unit;
    },
  };
}

function stalledPass(name: OptimizationPassName): OptimizationPass {
  return { name, transform: () => new Promise<MergedUnit>(() => undefined) };
}

describe("validatePassSelection", () => {
  it("accepts any subset in the fixed order", () => {
    expect(validatePassSelection(["dead-code", "profile"])).toEqual(["dead-code", "profile"]);
    expect(validatePassSelection([])).toEqual([]);
  });

  it("rejects unknown, repeated or reordered passes", () => {
    expect(() => validatePassSelection(["inline"])).toThrow(ConfigError);
    expect(() => validatePassSelection(["profile", "dead-code"])).toThrow(/must be listed once each/);
    expect(() => validatePassSelection(["dead-code", "dead-code"])).toThrow(ConfigError);
  });
});

describe("runOptimizationPipeline", () => {
  it("runs the default passes over the unit", async () => {
    const logger = new MemoryLogger("test-run");

    const result = await runOptimizationPipeline(UNIT, {
      enabledPasses: ["dead-code", "simplify-expressions", "substitute-data-structures", "profile"],
      passTimeoutSeconds: 30,
      exportRoots: [],
      logger,
    });

    expect(result.declarations.map((declaration) => declaration.text)).toEqual(["function main() { return 42; }"]);
    expect(result.profile?.map((item) => item.name)).toEqual(["main"]);
    expect(logger.eventsOfType("pass.complete").map((event) => event.pass)).toEqual([
      "dead-code",
      "simplify-expressions",
      "substitute-data-structures",
      "profile",
    ]);
  });

  it("runs only enabled passes, always in the fixed order", async () => {
    const calls: string[] = [];
    const passes = [
      recordingPass("profile", calls),
      recordingPass("simplify-expressions", calls),
      recordingPass("dead-code", calls),
    ];

    await runOptimizationPipeline(UNIT, {
      enabledPasses: ["dead-code", "profile"],
      passTimeoutSeconds: 30,
      exportRoots: [],
      logger: new MemoryLogger("test-run"),
      passes,
    });

    expect(calls).toEqual(["dead-code", "profile"]);
  });

  it("rejects a bad pass order before running anything", async () => {
    const calls: string[] = [];

    await expect(
      runOptimizationPipeline(UNIT, {
        enabledPasses: ["profile", "dead-code"],
        passTimeoutSeconds: 30,
        exportRoots: [],
        logger: new MemoryLogger("test-run"),
        passes: [recordingPass("dead-code", calls), recordingPass("profile", calls)],
      }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(calls).toEqual([]);
  });

  it("fails a pass that overruns its budget", async () => {
    const error = await runOptimizationPipeline(UNIT, {
      enabledPasses: ["simplify-expressions"],
      passTimeoutSeconds: 0.05,
      exportRoots: [],
      logger: new MemoryLogger("test-run"),
      passes: [stalledPass("simplify-expressions")],
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PassTimeoutError);
    expect(error instanceof PassTimeoutError ? error.pass : null).toBe("simplify-expressions");
  });

  it("stops with an aborted error when the run is cancelled", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort("SIGINT"), 10);

    await expect(
      runOptimizationPipeline(UNIT, {
        enabledPasses: ["profile"],
        passTimeoutSeconds: 30,
        exportRoots: [],
        logger: new MemoryLogger("test-run"),
        signal: controller.signal,
        passes: [stalledPass("profile")],
      }),
    ).rejects.toBeInstanceOf(MergeAbortedError);
  });
});
