// Conflict report.
// Purpose: side-channel record of everything a run could not decide on its own.
// Assumes entries are appended in stage order; the caller decides whether a run with entries proceeds.

import { z } from "zod";

import type { DeclarationOrigin } from "../model/schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type NearDuplicateConflict = {
  kind: "near-duplicate";
  group: number;
  canonical: DeclarationOrigin;
  rejected: DeclarationOrigin;
  confidence: number;
};

export type LicenseCycleConflict = {
  kind: "license-incompatible-cycle";
  declarations: DeclarationOrigin[];
  repositories: string[];
  incompatible: Array<[string, string]>;
  fatal: boolean;
};

export type DroppedUnitConflict = {
  kind: "dropped-unit";
  repositoryId: string;
  unitPath: string;
  message: string;
};

export type MissingDependencyConflict = {
  kind: "missing-dependency";
  declaration: DeclarationOrigin;
  reference: string;
  specifier: string | null;
};

export type ImportCollisionConflict = {
  kind: "import-collision";
  local: string;
  specifiers: string[];
};

// An exported duplicate whose name could not be kept as an alias of its canonical.
export type AliasCollisionConflict = {
  kind: "alias-collision";
  alias: DeclarationOrigin;
  target: string;
};

export type ConflictEntry =
  | NearDuplicateConflict
  | LicenseCycleConflict
  | DroppedUnitConflict
  | MissingDependencyConflict
  | ImportCollisionConflict
  | AliasCollisionConflict;

export type ConflictKind = ConflictEntry["kind"];

export type ConflictReportSnapshot = {
  run_id: string;
  generated_at: string;
  total: number;
  counts: Partial<Record<ConflictKind, number>>;
  entries: ConflictEntry[];
};

// =============================================================================
// REPORT
// =============================================================================

export class ConflictReport {
  private readonly items: ConflictEntry[] = [];

  constructor(public readonly runId: string) {}

  add(entry: ConflictEntry): void {
    this.items.push(entry);
  }

  get entries(): readonly ConflictEntry[] {
    return this.items;
  }

  hasConflicts(): boolean {
    return this.items.length > 0;
  }

  ofKind<K extends ConflictKind>(kind: K): Array<Extract<ConflictEntry, { kind: K }>> {
    return this.items.filter((entry): entry is Extract<ConflictEntry, { kind: K }> => entry.kind === kind);
  }

  snapshot(now: Date = new Date()): ConflictReportSnapshot {
    const counts: Partial<Record<ConflictKind, number>> = {};
    for (const entry of this.items) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }

    return {
      run_id: this.runId,
      generated_at: now.toISOString(),
      total: this.items.length,
      counts,
      entries: this.items.map((entry) => structuredClone(entry)),
    };
  }
}

// =============================================================================
// READING & DISPLAY
// =============================================================================

const DeclarationOriginSchema = z.object({
  repositoryId: z.string(),
  unitPath: z.string(),
  name: z.string(),
});

export const ConflictEntrySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("near-duplicate"),
    group: z.number().int(),
    canonical: DeclarationOriginSchema,
    rejected: DeclarationOriginSchema,
    confidence: z.number(),
  }),
  z.object({
    kind: z.literal("license-incompatible-cycle"),
    declarations: z.array(DeclarationOriginSchema),
    repositories: z.array(z.string()),
    incompatible: z.array(z.tuple([z.string(), z.string()])),
    fatal: z.boolean(),
  }),
  z.object({
    kind: z.literal("dropped-unit"),
    repositoryId: z.string(),
    unitPath: z.string(),
    message: z.string(),
  }),
  z.object({
    kind: z.literal("missing-dependency"),
    declaration: DeclarationOriginSchema,
    reference: z.string(),
    specifier: z.string().nullable(),
  }),
  z.object({
    kind: z.literal("import-collision"),
    local: z.string(),
    specifiers: z.array(z.string()),
  }),
  z.object({
    kind: z.literal("alias-collision"),
    alias: DeclarationOriginSchema,
    target: z.string(),
  }),
]);

export const ConflictReportSnapshotSchema = z.object({
  run_id: z.string(),
  generated_at: z.string(),
  total: z.number().int().nonnegative(),
  counts: z.record(z.string(), z.number().int()),
  entries: z.array(ConflictEntrySchema),
});

export function describeConflict(entry: ConflictEntry): string {
  switch (entry.kind) {
    case "near-duplicate":
      return `near-duplicate: kept ${formatOrigin(entry.canonical)}, review ${formatOrigin(entry.rejected)} (confidence ${entry.confidence.toFixed(2)})`;
    case "license-incompatible-cycle": {
      const pairs = entry.incompatible.map(([left, right]) => `${left} + ${right}`).join(", ");
      const names = entry.declarations.map(formatOrigin).join(" -> ");
      return `license-incompatible-cycle${entry.fatal ? " (fatal)" : ""}: ${names} [${pairs}]`;
    }
    case "dropped-unit":
      return `dropped-unit: ${entry.repositoryId}:${entry.unitPath} (${entry.message})`;
    case "missing-dependency": {
      const from = entry.specifier === null ? "" : ` from "${entry.specifier}"`;
      return `missing-dependency: ${formatOrigin(entry.declaration)} references "${entry.reference}"${from}`;
    }
    case "import-collision":
      return `import-collision: "${entry.local}" is bound from ${entry.specifiers.join(", ")}`;
    case "alias-collision":
      return `alias-collision: ${formatOrigin(entry.alias)} merged into ${entry.target}, export name already bound`;
  }
}

function formatOrigin(origin: DeclarationOrigin): string {
  return `${origin.repositoryId}:${origin.unitPath}#${origin.name}`;
}
