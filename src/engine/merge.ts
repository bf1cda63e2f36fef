/*
Purpose: merge orchestrator. Runs every stage from fingerprinting to serialization over ingested repositories.
Assumptions: repositories are immutable once handed over; the conflict report may already hold ingest entries.
Usage: const result = await merge(repositories, config.engine, { policy, logger, signal, report }).
*/

import type { EngineConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { logEngineEvent, MemoryLogger, type EventLogger } from "../core/logger.js";
import { mapWithConcurrency } from "../core/pool.js";
import { compareText } from "../core/utils.js";
import type { LicensePolicy } from "../license/policy.js";

import { AttributionAnnotator, collectNotices } from "./attribution/annotator.js";
import { collectLibraryUses, logLibraryUsage, summarizeLibraries } from "./attribution/libraries.js";
import { EngineError, MergeAbortedError } from "./errors.js";
import { fingerprintDeclaration } from "./fingerprint/fingerprint.js";
import { buildDuplicateGroups, SimilarityIndex } from "./fingerprint/similarity-index.js";
import { buildDependencyGraph } from "./graph/dependency-graph.js";
import type { DeclarationEntry, MergedUnit, Repository } from "./model/schema.js";
import { reconcileNamespace } from "./namespace/reconciler.js";
import { runOptimizationPipeline } from "./optimize/pipeline.js";
import type { OptimizationPass } from "./optimize/types.js";
import { ConflictReport, type ConflictReportSnapshot } from "./report/conflict-report.js";
import { resolveOverlaps } from "./resolve/overlap-resolver.js";
import { serializeMergedUnit } from "./serialize.js";

// =============================================================================
// TYPES
// =============================================================================

export type MergeOptions = {
  policy: LicensePolicy;
  logger?: EventLogger;
  report?: ConflictReport;
  signal?: AbortSignal;
  annotator?: AttributionAnnotator;
  passes?: readonly OptimizationPass[];
};

export type MergeStatus = "clean" | "conflicts";

export type MergeStats = {
  repositories: number;
  units: number;
  declarations: number;
  fingerprints: number;
  groups: number;
  canonicals: number;
  renamed: number;
  emitted: number;
};

export type MergeResult = {
  status: MergeStatus;
  unit: MergedUnit;
  output: string;
  report: ConflictReportSnapshot;
  stats: MergeStats;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function merge(
  repositories: readonly Repository[],
  config: EngineConfig,
  options: MergeOptions,
): Promise<MergeResult> {
  const logger = options.logger ?? new MemoryLogger();
  const report = options.report ?? new ConflictReport(logger.runId);

  try {
    return await runMerge(repositories, config, { ...options, logger, report });
  } catch (err) {
    if (err instanceof EngineError) {
      throw err.attachReport(report.snapshot());
    }
    if (options.signal?.aborted) {
      throw new MergeAbortedError(options.signal.reason).attachReport(report.snapshot());
    }
    throw err;
  }
}

// =============================================================================
// STAGES
// =============================================================================

async function runMerge(
  repositories: readonly Repository[],
  config: EngineConfig,
  options: MergeOptions & { logger: EventLogger; report: ConflictReport },
): Promise<MergeResult> {
  const { logger, report, policy, signal } = options;
  assertUniqueRepositories(repositories);

  const entries = await buildArena(repositories, config.fingerprint_concurrency, signal);

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
  logEngineEvent(logger, "index.sealed", {
    declarations: index.declarationCount,
    fingerprints: index.fingerprintCount,
  });

  signal?.throwIfAborted();
  const groups = buildDuplicateGroups(index, config.near_duplicate_threshold);
  const { canonicals, canonicalOfEntry } = resolveOverlaps({
    entries,
    groups,
    policy,
    autoMergeConfidenceFloor: config.auto_merge_confidence_floor,
    report,
    logger,
  });

  signal?.throwIfAborted();
  const graph = buildDependencyGraph({
    entries,
    canonicals,
    canonicalOfEntry,
    policy,
    allowIncompatibleCycles: config.allow_incompatible_cycles,
    report,
    logger,
  });

  const reconciled = reconcileNamespace({ entries, canonicals, graph, policy, report, logger });
  const annotator = options.annotator ?? (await AttributionAnnotator.load());
  const annotated: MergedUnit = {
    declarations: annotator.annotateAll(reconciled.declarations, canonicals, entries),
    imports: reconciled.imports,
    aliases: reconciled.aliases,
    libraries: [],
    notices: [],
    profile: null,
  };

  const optimized = await runOptimizationPipeline(annotated, {
    enabledPasses: config.enabled_optimization_passes,
    passTimeoutSeconds: config.pass_timeout_seconds,
    exportRoots: config.export_roots,
    logger,
    signal,
    passes: options.passes,
  });

  const emitted = new Set(optimized.declarations.map((declaration) => declaration.id));
  const libraries = summarizeLibraries(collectLibraryUses(canonicals, entries), emitted);
  logLibraryUsage(logger, libraries);

  const unit: MergedUnit = {
    ...optimized,
    libraries,
    notices: collectNotices(optimized.declarations, repositories),
  };
  const output = serializeMergedUnit(unit, annotator.renderNotices(unit.notices, unit.libraries));

  const stats: MergeStats = {
    repositories: repositories.length,
    units: repositories.reduce((total, repository) => total + repository.units.length, 0),
    declarations: entries.length,
    fingerprints: index.fingerprintCount,
    groups: groups.length,
    canonicals: canonicals.length,
    renamed: reconciled.renamed,
    emitted: unit.declarations.length,
  };
  const status: MergeStatus = report.hasConflicts() ? "conflicts" : "clean";
  logEngineEvent(logger, "merge.complete", { status, ...stats, conflicts: report.entries.length });

  return { status, unit, output, report: report.snapshot(), stats };
}

// Flat declaration table in repository-id, unit-path, source order; fingerprinting runs per unit in parallel.
async function buildArena(
  repositories: readonly Repository[],
  concurrency: number,
  signal?: AbortSignal,
): Promise<DeclarationEntry[]> {
  const units = [...repositories]
    .sort((a, b) => compareText(a.id, b.id))
    .flatMap((repository) =>
      [...repository.units]
        .sort((a, b) => compareText(a.path, b.path))
        .map((unit) => ({ repository, unit })),
    );

  const fingerprinted = await mapWithConcurrency(
    units,
    concurrency,
    ({ unit }) => unit.declarations.map((declaration) => fingerprintDeclaration(declaration)),
    signal,
  );

  const entries: DeclarationEntry[] = [];
  units.forEach(({ repository, unit }, unitIndex) => {
    const results = fingerprinted[unitIndex] ?? [];
    unit.declarations.forEach((declaration, declarationIndex) => {
      const result = results[declarationIndex];
      if (!result) return;
      entries.push({
        index: entries.length,
        declaration,
        repository,
        unit,
        fingerprint: result.fingerprint,
        normalized: result.normalized,
      });
    });
  });
  return entries;
}

function assertUniqueRepositories(repositories: readonly Repository[]): void {
  const seen = new Set<string>();
  for (const repository of repositories) {
    if (seen.has(repository.id)) {
      throw new ConfigError(`Repository id "${repository.id}" is used more than once.`);
    }
    seen.add(repository.id);
  }
}
