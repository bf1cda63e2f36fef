/*
Purpose: run the enabled optimization passes in their fixed order, each under its own time budget.
Assumptions: a pass observes ctx.signal between declarations; a pass that overruns is fatal and never retried.
Usage: await runOptimizationPipeline(unit, { enabledPasses, passTimeoutSeconds, exportRoots, logger, signal }).
*/

import { ConfigError } from "../../core/errors.js";
import { logEngineEvent, type EventLogger } from "../../core/logger.js";
import { MergeAbortedError, PassTimeoutError } from "../errors.js";
import type { MergedUnit } from "../model/schema.js";

import { DeadCodePass } from "./passes/dead-code.js";
import { ProfilePass } from "./passes/profile.js";
import { SimplifyExpressionsPass } from "./passes/simplify-expressions.js";
import { SubstituteDataStructuresPass } from "./passes/substitute-data-structures.js";
import {
  OPTIMIZATION_PASS_NAMES,
  type OptimizationPass,
  type OptimizationPassName,
  type PassContext,
} from "./types.js";

export type PipelineOptions = {
  enabledPasses: readonly OptimizationPassName[];
  passTimeoutSeconds: number;
  exportRoots: readonly string[];
  logger: EventLogger;
  signal?: AbortSignal;
  passes?: readonly OptimizationPass[];
};

export function createDefaultPasses(): OptimizationPass[] {
  return [
    new DeadCodePass(),
    new SimplifyExpressionsPass(),
    new SubstituteDataStructuresPass(),
    new ProfilePass(),
  ];
}

// Enabled passes must keep the fixed relative order; any subset is allowed.
export function validatePassSelection(enabled: readonly string[]): OptimizationPassName[] {
  const selected: OptimizationPassName[] = [];
  let lastPosition = -1;
  for (const name of enabled) {
    const position = OPTIMIZATION_PASS_NAMES.findIndex((candidate) => candidate === name);
    const known = OPTIMIZATION_PASS_NAMES[position];
    if (known === undefined) {
      throw new ConfigError(
        `Unknown optimization pass "${name}". Expected one of: ${OPTIMIZATION_PASS_NAMES.join(", ")}.`,
      );
    }
    if (position <= lastPosition) {
      throw new ConfigError(
        `Optimization passes must be listed once each in the order ${OPTIMIZATION_PASS_NAMES.join(" -> ")}.`,
      );
    }
    lastPosition = position;
    selected.push(known);
  }
  return selected;
}

export async function runOptimizationPipeline(
  unit: MergedUnit,
  options: PipelineOptions,
): Promise<MergedUnit> {
  const enabled = new Set(validatePassSelection(options.enabledPasses));
  const passes = (options.passes ?? createDefaultPasses())
    .filter((pass) => enabled.has(pass.name))
    .sort(
      (a, b) => OPTIMIZATION_PASS_NAMES.indexOf(a.name) - OPTIMIZATION_PASS_NAMES.indexOf(b.name),
    );
  const exportRoots = new Set(options.exportRoots);

  let current = unit;
  for (const pass of passes) {
    options.signal?.throwIfAborted();
    const startedAt = Date.now();
    logEngineEvent(options.logger, "pass.start", {
      pass: pass.name,
      declarations: current.declarations.length,
    });

    current = await runWithBudget(pass, current, {
      timeoutSeconds: options.passTimeoutSeconds,
      exportRoots,
      logger: options.logger,
      signal: options.signal,
    });

    logEngineEvent(options.logger, "pass.complete", {
      pass: pass.name,
      declarations: current.declarations.length,
      duration_ms: Date.now() - startedAt,
    });
  }

  return current;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runWithBudget(
  pass: OptimizationPass,
  unit: MergedUnit,
  opts: {
    timeoutSeconds: number;
    exportRoots: ReadonlySet<string>;
    logger: EventLogger;
    signal?: AbortSignal;
  },
): Promise<MergedUnit> {
  const controller = new AbortController();
  const timeoutError = new PassTimeoutError(pass.name, opts.timeoutSeconds);

  let timer: NodeJS.Timeout | undefined;
  if (opts.timeoutSeconds > 0) {
    timer = setTimeout(() => controller.abort(timeoutError), opts.timeoutSeconds * 1000);
  }

  const onOuterAbort = (): void => controller.abort(new MergeAbortedError(opts.signal?.reason));
  opts.signal?.addEventListener("abort", onOuterAbort, { once: true });

  let rejectOnAbort: ((reason: unknown) => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectOnAbort = reject;
  });
  const onAbort = (): void => rejectOnAbort?.(controller.signal.reason);
  controller.signal.addEventListener("abort", onAbort, { once: true });

  const ctx: PassContext = {
    signal: controller.signal,
    logger: opts.logger,
    exportRoots: opts.exportRoots,
  };

  try {
    return await Promise.race([pass.transform(unit, ctx), aborted]);
  } catch (err) {
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof PassTimeoutError || reason instanceof MergeAbortedError) throw reason;
    }
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onOuterAbort);
    controller.signal.removeEventListener("abort", onAbort);
  }
}
