import { MemoryLogger } from "../core/logger.js";
import { compareText } from "../core/utils.js";
import { LicensePolicy, type LicensePolicyTable } from "../license/policy.js";

import { fingerprintDeclaration } from "./fingerprint/fingerprint.js";
import { buildDuplicateGroups, SimilarityIndex } from "./fingerprint/similarity-index.js";
import { buildDependencyGraph, type DependencyGraph } from "./graph/dependency-graph.js";
import { parse } from "./model/parse.js";
import type {
  CanonicalDeclaration,
  DeclarationEntry,
  DuplicateGroup,
  MergedDeclaration,
  Repository,
} from "./model/schema.js";
import { ConflictReport } from "./report/conflict-report.js";
import { resolveOverlaps } from "./resolve/overlap-resolver.js";

// =============================================================================
// FIXTURE BUILDERS
// =============================================================================

export const TEST_POLICY_TABLE: LicensePolicyTable = {
  permissive: { permissiveness_rank: 2, combinable_with: [] },
  restrictive: { permissiveness_rank: 1, combinable_with: [] },
};

export function testPolicy(table: LicensePolicyTable = TEST_POLICY_TABLE): LicensePolicy {
  return new LicensePolicy(table);
}

export function makeRepository(
  id: string,
  files: Record<string, string>,
  opts: { trustRank?: number; licenseId?: string; licenseText?: string; revision?: string | null } = {},
): Repository {
  return {
    id,
    rootPath: `/repos/${id}`,
    trustRank: opts.trustRank ?? 0,
    license: { id: opts.licenseId ?? "permissive", text: opts.licenseText ?? "" },
    revision: opts.revision ?? null,
    units: Object.keys(files)
      .sort(compareText)
      .map((unitPath) => parse({ id }, unitPath, files[unitPath] ?? "")),
  };
}

// Same arena layout as merge(): repository id, unit path, then source order.
export function buildEntries(repositories: readonly Repository[]): DeclarationEntry[] {
  const entries: DeclarationEntry[] = [];
  for (const repository of [...repositories].sort((a, b) => compareText(a.id, b.id))) {
    for (const unit of [...repository.units].sort((a, b) => compareText(a.path, b.path))) {
      for (const declaration of unit.declarations) {
        const { fingerprint, normalized } = fingerprintDeclaration(declaration);
        entries.push({ index: entries.length, declaration, repository, unit, fingerprint, normalized });
      }
    }
  }
  return entries;
}

export function groupEntries(entries: readonly DeclarationEntry[], nearThreshold: number): DuplicateGroup[] {
  const index = new SimilarityIndex();
  for (const entry of entries) {
    index.add({
      index: entry.index,
      fingerprint: entry.fingerprint,
      kind: entry.declaration.kind,
      normalized: entry.normalized,
    });
  }
  index.seal();
  return buildDuplicateGroups(index, nearThreshold);
}

export type PreparedMerge = {
  entries: DeclarationEntry[];
  canonicals: CanonicalDeclaration[];
  canonicalOfEntry: number[];
  graph: DependencyGraph;
  policy: LicensePolicy;
  report: ConflictReport;
  logger: MemoryLogger;
};

// Runs every stage up to the dependency graph.
export function prepareMerge(
  repositories: readonly Repository[],
  opts: {
    policy?: LicensePolicy;
    nearThreshold?: number;
    autoMergeConfidenceFloor?: number;
    allowIncompatibleCycles?: boolean;
  } = {},
): PreparedMerge {
  const policy = opts.policy ?? testPolicy();
  const report = new ConflictReport("test-run");
  const logger = new MemoryLogger("test-run");
  const entries = buildEntries(repositories);
  const groups = groupEntries(entries, opts.nearThreshold ?? 0);
  const { canonicals, canonicalOfEntry } = resolveOverlaps({
    entries,
    groups,
    policy,
    autoMergeConfidenceFloor: opts.autoMergeConfidenceFloor ?? 0.95,
    report,
    logger,
  });
  const graph = buildDependencyGraph({
    entries,
    canonicals,
    canonicalOfEntry,
    policy,
    allowIncompatibleCycles: opts.allowIncompatibleCycles ?? false,
    report,
    logger,
  });
  return { entries, canonicals, canonicalOfEntry, graph, policy, report, logger };
}

export function canonicalName(prepared: Pick<PreparedMerge, "entries" | "canonicals">, index: number): string {
  const canonical = prepared.canonicals[index];
  const entry = canonical ? prepared.entries[canonical.entry] : undefined;
  return entry ? `${entry.repository.id}:${entry.declaration.name}` : `#${index}`;
}

export function mergedDeclaration(
  overrides: Partial<MergedDeclaration> & Pick<MergedDeclaration, "id" | "name">,
): MergedDeclaration {
  return {
    originalName: overrides.name,
    kind: "function",
    text: `function ${overrides.name}() {}`,
    exported: false,
    origin: { repositoryId: "alpha", unitPath: "src/index.ts", name: overrides.name },
    attribution: [],
    rejected: [],
    dependsOn: [],
    externalUses: [],
    annotation: "",
    ...overrides,
  };
}
