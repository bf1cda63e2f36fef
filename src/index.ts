export { main, buildCli } from "./cli/index.js";

export { loadProjectConfig, parseProjectConfig } from "./core/config-loader.js";
export { defaultEngineConfig } from "./core/config.js";
export type { EngineConfig, ProjectConfig, RepositoryConfig } from "./core/config.js";
export { JsonlLogger, MemoryLogger, logEngineEvent } from "./core/logger.js";
export type { EventLogger } from "./core/logger.js";

export { merge } from "./engine/merge.js";
export type { MergeOptions, MergeResult, MergeStats, MergeStatus } from "./engine/merge.js";
export { parse } from "./engine/model/parse.js";
export type * from "./engine/model/schema.js";
export { fingerprintDeclaration } from "./engine/fingerprint/fingerprint.js";
export { SimilarityIndex, buildDuplicateGroups } from "./engine/fingerprint/similarity-index.js";
export { resolveOverlaps } from "./engine/resolve/overlap-resolver.js";
export { buildDependencyGraph } from "./engine/graph/dependency-graph.js";
export { reconcileNamespace } from "./engine/namespace/reconciler.js";
export { AttributionAnnotator } from "./engine/attribution/annotator.js";
export { collectLibraryUses, summarizeLibraries } from "./engine/attribution/libraries.js";
export { runOptimizationPipeline, createDefaultPasses } from "./engine/optimize/pipeline.js";
export { ConflictReport, describeConflict } from "./engine/report/conflict-report.js";
export type { ConflictEntry, ConflictReportSnapshot } from "./engine/report/conflict-report.js";
export * from "./engine/errors.js";

export { ingestRepositories, ingestRepository } from "./ingest/ingest.js";
export { LicensePolicy, loadLicensePolicyFile, parseLicensePolicy } from "./license/policy.js";
export { createDefaultLicenseLookups, resolveLicense } from "./license/lookup.js";
export type { LicenseLookup } from "./license/lookup.js";
