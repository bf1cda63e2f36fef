// Optimization pass contracts.
// Purpose: one capability per pass, composed by the fixed-order pipeline orchestrator.

import type { EventLogger } from "../../core/logger.js";
import type { MergedUnit } from "../model/schema.js";

export const OPTIMIZATION_PASS_NAMES = [
  "dead-code",
  "simplify-expressions",
  "substitute-data-structures",
  "profile",
] as const;

export type OptimizationPassName = (typeof OPTIMIZATION_PASS_NAMES)[number];

export type PassContext = {
  signal: AbortSignal;
  logger: EventLogger;
  exportRoots: ReadonlySet<string>;
};

export interface OptimizationPass {
  readonly name: OptimizationPassName;
  transform(unit: MergedUnit, ctx: PassContext): Promise<MergedUnit>;
}
