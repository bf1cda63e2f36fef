import path from "node:path";

import { Command } from "commander";

import { loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath } from "../core/config-discovery.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { conflictReportPath } from "../core/paths.js";
import { compareText, readJsonFile } from "../core/utils.js";
import {
  ConflictReportSnapshotSchema,
  describeConflict,
  type ConflictReportSnapshot,
} from "../engine/report/conflict-report.js";

import { EXIT_CONFLICTS } from "./merge.js";

export type ReportCommandOptions = {
  config?: string;
  out?: string;
  json?: boolean;
  failOnConflicts?: boolean;
  cwd?: string;
};

const REPORT_HINT = "Run `autodeploy merge` first, or pass --out <dir> pointing at a previous run.";

export function registerReportCommand(program: Command): void {
  program
    .command("report")
    .description("Summarize the conflict report of the last merge")
    .option("--config <path>", "Config file (default: nearest .autodeploy/config.yaml)")
    .option("--out <dir>", "Output directory of the merge run")
    .option("--json", "Print the raw report", false)
    .option("--fail-on-conflicts", "Exit with code 2 when the report is not empty", false)
    .action(async (opts: ReportCommandOptions) => {
      process.exitCode = await reportCommand(opts);
    });
}

export async function reportCommand(
  opts: ReportCommandOptions,
  print: (line: string) => void = (line) => console.log(line),
): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const outDir = opts.out
    ? path.resolve(cwd, opts.out)
    : loadProjectConfig(resolveProjectConfigPath({ explicitPath: opts.config, cwd }).configPath).output.dir;

  const report = await readConflictReport(conflictReportPath(outDir));
  if (opts.json) {
    print(JSON.stringify(report, null, 2));
  } else {
    print(`Conflict report ${report.run_id} (${report.generated_at}): ${report.total} entr${report.total === 1 ? "y" : "ies"}`);
    for (const [kind, count] of Object.entries(report.counts).sort(([a], [b]) => compareText(a, b))) {
      print(`- ${kind}: ${count}`);
    }
    for (const entry of report.entries) {
      print(`  ${describeConflict(entry)}`);
    }
  }

  return report.total > 0 && opts.failOnConflicts ? EXIT_CONFLICTS : 0;
}

export async function readConflictReport(reportPath: string): Promise<ConflictReportSnapshot> {
  let raw: unknown;
  try {
    raw = await readJsonFile(reportPath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.output,
      title: "Conflict report missing.",
      message: `No readable conflict report at ${reportPath}.`,
      hint: REPORT_HINT,
      cause: err,
    });
  }

  const parsed = ConflictReportSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.output,
      title: "Conflict report invalid.",
      message: `Conflict report at ${reportPath} does not match the expected format.`,
      hint: REPORT_HINT,
      cause: parsed.error,
    });
  }
  return parsed.data;
}
