/*
Purpose: merge engine failure kinds.
Assumptions: fatal errors abort the run and carry the conflict report accumulated so far.
Usage: throw new PassTimeoutError("simplify-expressions", 30); err.report after merge() rejects.
*/

import { AutoDeployError } from "../core/errors.js";

import type { ConflictReportSnapshot } from "./report/conflict-report.js";

export type EngineErrorKind =
  | "ParseError"
  | "LicenseIncompatibleCycle"
  | "PassTimeout"
  | "UnresolvedReference"
  | "Aborted";

export class EngineError extends AutoDeployError {
  private attachedReport: ConflictReportSnapshot | null = null;

  constructor(
    public readonly kind: EngineErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "EngineError";
  }

  get report(): ConflictReportSnapshot | null {
    return this.attachedReport;
  }

  attachReport(report: ConflictReportSnapshot): this {
    this.attachedReport = report;
    return this;
  }
}

export class ParseError extends EngineError {
  constructor(
    public readonly repositoryId: string,
    public readonly unitPath: string,
    public readonly diagnostics: string[],
  ) {
    super("ParseError", `Failed to parse ${repositoryId}:${unitPath}: ${diagnostics.join("; ")}`);
    this.name = "ParseError";
  }
}

export class LicenseIncompatibleCycleError extends EngineError {
  constructor(
    public readonly declarations: string[],
    public readonly incompatible: Array<[string, string]>,
  ) {
    const pairs = incompatible.map(([left, right]) => `${left} + ${right}`).join(", ");
    super(
      "LicenseIncompatibleCycle",
      `Dependency cycle ${declarations.join(" -> ")} combines incompatible licenses (${pairs}).`,
    );
    this.name = "LicenseIncompatibleCycleError";
  }
}

export class PassTimeoutError extends EngineError {
  constructor(
    public readonly pass: string,
    public readonly timeoutSeconds: number,
  ) {
    super("PassTimeout", `Optimization pass "${pass}" exceeded its ${timeoutSeconds}s budget.`);
    this.name = "PassTimeoutError";
  }
}

// Internal-consistency failure: a correct run never produces one.
export class UnresolvedReferenceError extends EngineError {
  constructor(
    public readonly declaration: string,
    public readonly reference: string,
  ) {
    super(
      "UnresolvedReference",
      `Reference "${reference}" in "${declaration}" does not resolve to exactly one declaration.`,
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class MergeAbortedError extends EngineError {
  constructor(reason: unknown) {
    super("Aborted", "Merge run was aborted.", reason);
    this.name = "MergeAbortedError";
  }
}
