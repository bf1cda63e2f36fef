import path from "node:path";

import { Command } from "commander";

import { loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath } from "../core/config-discovery.js";
import type { ProjectConfig } from "../core/config.js";
import { OutputError } from "../core/errors.js";
import { JsonlLogger, logEngineEvent } from "../core/logger.js";
import { conflictReportPath, engineLogPath } from "../core/paths.js";
import { defaultRunId, writeJsonFile, writeTextFile } from "../core/utils.js";
import { EngineError } from "../engine/errors.js";
import { merge, type MergeResult } from "../engine/merge.js";
import { ConflictReport, describeConflict } from "../engine/report/conflict-report.js";
import { ingestRepositories } from "../ingest/ingest.js";
import { createDefaultLicenseLookups, type LicenseLookup } from "../license/lookup.js";
import {
  defaultLicensePolicyPath,
  loadLicensePolicyFile,
  parseLicensePolicy,
  type LicensePolicy,
} from "../license/policy.js";

import { createMergeStopSignalHandler } from "./signal-handlers.js";

export const EXIT_CONFLICTS = 2;

export type MergeCommandOptions = {
  config?: string;
  out?: string;
  failOnConflicts?: boolean;
  json?: boolean;
  runId?: string;
  cwd?: string;
};

export type MergeCommandDeps = {
  lookups?: readonly LicenseLookup[];
  revision?: (rootPath: string) => Promise<string | null>;
  print?: (line: string) => void;
  signal?: AbortSignal;
};

export type MergeCommandResult = {
  exitCode: number;
  outputPath: string;
  reportPath: string;
  result: MergeResult;
};

export function registerMergeCommand(program: Command): void {
  program
    .command("merge")
    .description("Merge the configured repositories into one deduplicated, attributed unit")
    .option("--config <path>", "Config file (default: nearest .autodeploy/config.yaml)")
    .option("--out <dir>", "Output directory (overrides output.dir)")
    .option("--run-id <id>", "Run ID used in logs and the conflict report")
    .option("--fail-on-conflicts", "Exit with code 2 when the conflict report is not empty", false)
    .option("--json", "Print the run summary as JSON", false)
    .action(async (opts: MergeCommandOptions) => {
      const stopHandler = createMergeStopSignalHandler({
        onSignal: (signal) => console.log(`Received ${signal}. Stopping merge.`),
      });
      try {
        const outcome = await mergeCommand(opts, { signal: stopHandler.signal });
        process.exitCode = outcome.exitCode;
      } finally {
        stopHandler.cleanup();
      }
    });
}

export async function mergeCommand(
  opts: MergeCommandOptions,
  deps: MergeCommandDeps = {},
): Promise<MergeCommandResult> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const cwd = opts.cwd ?? process.cwd();
  const { configPath } = resolveProjectConfigPath({ explicitPath: opts.config, cwd });
  const config = loadProjectConfig(configPath);

  const outDir = opts.out ? path.resolve(cwd, opts.out) : config.output.dir;
  const runId = opts.runId ?? defaultRunId();
  const logger = new JsonlLogger(engineLogPath(outDir), { runId });
  const report = new ConflictReport(runId);
  const reportPath = conflictReportPath(outDir);

  logEngineEvent(logger, "merge.start", {
    config: configPath,
    repositories: config.repositories.map((repository) => repository.id),
  });

  let result: MergeResult;
  try {
    const policy = await loadPolicy(config, configPath);
    const lookups = deps.lookups ?? (await createDefaultLicenseLookups());
    const repositories = await ingestRepositories(config.repositories, {
      lookups,
      report,
      logger,
      signal: deps.signal,
      revision: deps.revision,
    });
    result = await merge(repositories, config.engine, { policy, logger, report, signal: deps.signal });
  } catch (err) {
    if (err instanceof EngineError && err.report) {
      const partial = err.report;
      await writeArtifact(reportPath, () => writeJsonFile(reportPath, partial));
    }
    throw err;
  }

  const outputPath = path.join(outDir, config.output.file);
  await writeArtifact(outputPath, () => writeTextFile(outputPath, result.output));
  await writeArtifact(reportPath, () => writeJsonFile(reportPath, result.report));

  const exitCode = result.status === "conflicts" && opts.failOnConflicts ? EXIT_CONFLICTS : 0;
  printSummary(result, { outputPath, reportPath, json: opts.json ?? false, print });
  return { exitCode, outputPath, reportPath, result };
}

export async function loadPolicy(config: ProjectConfig, configPath: string): Promise<LicensePolicy> {
  if (config.license_policy === undefined) {
    return loadLicensePolicyFile(defaultLicensePolicyPath());
  }
  if (typeof config.license_policy === "string") {
    return loadLicensePolicyFile(config.license_policy);
  }
  return parseLicensePolicy(config.license_policy, configPath);
}

async function writeArtifact(filePath: string, write: () => Promise<void>): Promise<void> {
  try {
    await write();
  } catch (err) {
    throw new OutputError(`Failed to write ${filePath}.`, filePath, err);
  }
}

function printSummary(
  result: MergeResult,
  opts: { outputPath: string; reportPath: string; json: boolean; print: (line: string) => void },
): void {
  if (opts.json) {
    opts.print(
      JSON.stringify(
        {
          status: result.status,
          output: opts.outputPath,
          report: opts.reportPath,
          stats: result.stats,
          conflicts: result.report.counts,
        },
        null,
        2,
      ),
    );
    return;
  }

  const { stats } = result;
  opts.print(`Merge ${result.report.run_id} finished with status: ${result.status}`);
  opts.print(
    `- ${stats.declarations} declaration(s) from ${stats.repositories} repositories -> ${stats.emitted} emitted (${stats.canonicals} canonical, ${stats.renamed} renamed)`,
  );
  opts.print(`- Output: ${opts.outputPath}`);
  opts.print(`- Conflict report: ${opts.reportPath}`);
  for (const entry of result.report.entries) {
    opts.print(`  ${describeConflict(entry)}`);
  }
}
