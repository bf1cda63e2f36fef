import { Command } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
} from "../core/error-format.js";

import { toUserFacingError } from "./error-mapping.js";
import { registerInitCommand } from "./init.js";
import { registerMergeCommand } from "./merge.js";
import { registerReportCommand } from "./report.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("autodeploy")
    .description("Merge several TypeScript repositories into one deduplicated, license-attributed library")
    .version("0.1.0")
    .option("--debug", "Print error codes, causes and stacks", false);

  registerInitCommand(program);
  registerMergeCommand(program);
  registerReportCommand(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<{ debug?: boolean }>().debug === true || argv.includes("--debug");
    printError(toUserFacingError(err), debug);
    process.exitCode = 1;
  }
}

const LINE_STYLES: Record<ErrorFormatLine["kind"], AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  report: ["yellow"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_LABELS: Partial<Record<ErrorFormatLine["kind"], string>> = {
  hint: "Hint: ",
  next: "Next: ",
  report: "Report: ",
  code: "Code: ",
  name: "Error: ",
  cause: "Cause: ",
};

function printError(error: unknown, debug: boolean): void {
  const format: AnsiFormatter = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
  for (const line of formatErrorLines(error, { mode: debug ? "debug" : "short" })) {
    console.error(format(`${LINE_LABELS[line.kind] ?? ""}${line.text}`, LINE_STYLES[line.kind]));
  }
}
