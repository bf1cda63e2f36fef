/*
Purpose: turn configured repository checkouts into parsed, immutable Repository records.
Assumptions: repository directories already exist on disk; acquisition happens before this step.
Usage: const repositories = await ingestRepositories(config.repositories, { lookups, report, logger }).
*/

import fsp from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { minimatch } from "minimatch";

import type { RepositoryConfig } from "../core/config.js";
import { IngestError } from "../core/errors.js";
import { logEngineEvent, type EventLogger } from "../core/logger.js";
import { mapWithConcurrency } from "../core/pool.js";
import { compareText, toPosixPath } from "../core/utils.js";
import { ParseError } from "../engine/errors.js";
import { isSourcePath, parse } from "../engine/model/parse.js";
import type { Repository, SourceUnit } from "../engine/model/schema.js";
import type { ConflictReport } from "../engine/report/conflict-report.js";
import { resolveLicense, type LicenseLookup } from "../license/lookup.js";

import { readRevision } from "./revision.js";

export type IngestOptions = {
  lookups: readonly LicenseLookup[];
  report: ConflictReport;
  logger: EventLogger;
  concurrency?: number;
  signal?: AbortSignal;
  revision?: (rootPath: string) => Promise<string | null>;
};

const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", "dist", "build", "coverage", ".autodeploy"]);
const DEFAULT_READ_CONCURRENCY = 8;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function ingestRepositories(
  repositories: readonly RepositoryConfig[],
  options: IngestOptions,
): Promise<Repository[]> {
  const ingested: Repository[] = [];
  for (const repository of repositories) {
    options.signal?.throwIfAborted();
    ingested.push(await ingestRepository(repository, options));
  }
  return ingested;
}

export async function ingestRepository(
  config: RepositoryConfig,
  options: IngestOptions,
): Promise<Repository> {
  const rootPath = path.resolve(config.path);
  const stat = await fse.stat(rootPath).catch((err: unknown) => {
    throw new IngestError(`Repository "${config.id}" not found at ${rootPath}.`, config.id, err);
  });
  if (!stat.isDirectory()) {
    throw new IngestError(`Repository "${config.id}" path ${rootPath} is not a directory.`, config.id);
  }

  const license = await resolveLicense(options.lookups, {
    repositoryId: config.id,
    rootPath,
    declared: config.license,
  });
  const revision = await (options.revision ?? readRevision)(rootPath);

  const files = (await listSourceFiles(rootPath)).filter((file) =>
    matchesFilters(file, config.include, config.exclude),
  );

  const parsed = await mapWithConcurrency(
    files,
    options.concurrency ?? DEFAULT_READ_CONCURRENCY,
    async (file) => {
      const content = await fse.readFile(path.join(rootPath, file), "utf8");
      return parseUnit(config.id, file, content, options);
    },
    options.signal,
  );
  const units = parsed.filter((unit): unit is SourceUnit => unit !== null);

  logEngineEvent(options.logger, "ingest.repository", {
    repository: config.id,
    license: license.id,
    revision,
    units: units.length,
    dropped: parsed.length - units.length,
  });

  return {
    id: config.id,
    rootPath,
    trustRank: config.trust_rank,
    license,
    revision,
    units,
  };
}

// A unit with syntax errors is dropped and reported; the run carries on without it.
export function parseUnit(
  repositoryId: string,
  unitPath: string,
  content: string,
  options: Pick<IngestOptions, "report" | "logger">,
): SourceUnit | null {
  try {
    const unit = parse({ id: repositoryId }, unitPath, content);
    logEngineEvent(options.logger, "ingest.unit", {
      repository: repositoryId,
      unit: unitPath,
      declarations: unit.declarations.length,
      skipped: unit.skippedStatements,
    });
    return unit;
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    options.report.add({
      kind: "dropped-unit",
      repositoryId,
      unitPath,
      message: err.diagnostics.join("; "),
    });
    logEngineEvent(options.logger, "ingest.dropped", {
      repository: repositoryId,
      unit: unitPath,
      diagnostics: err.diagnostics,
    });
    return null;
  }
}

export function matchesFilters(
  filePath: string,
  include: readonly string[],
  exclude: readonly string[],
): boolean {
  const included = include.some((pattern) => minimatch(filePath, pattern, { dot: true }));
  if (!included) return false;
  return !exclude.some((pattern) => minimatch(filePath, pattern, { dot: true }));
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listSourceFiles(rootPath: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (relativeDir: string): Promise<void> => {
    const entries = await fsp.readdir(path.join(rootPath, relativeDir), { withFileTypes: true });
    for (const entry of entries) {
      const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(relative);
      } else if (entry.isFile() && isSourcePath(entry.name)) {
        files.push(toPosixPath(relative));
      }
    }
  };
  await walk("");
  return files.sort(compareText);
}
