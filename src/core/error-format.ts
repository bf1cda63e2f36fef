/*
Purpose: display lines for a failed CLI run, including the partial conflict report an engine error carries.
Assumptions: color only on a TTY and only when NO_COLOR is unset; debug mode adds the code, the cause chain and a stack.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import { EngineError } from "../engine/errors.js";
import type { ConflictReportSnapshot } from "../engine/report/conflict-report.js";

import { USER_FACING_ERROR_CODES, UserFacingError, type UserFacingErrorCode } from "./errors.js";
import { compareText } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
  maxCauseDepth?: number;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "report"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

type ErrorSummary = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause: unknown;
};

const UNEXPECTED_TITLE = "Unexpected error";
const UNEXPECTED_MESSAGE = "An unexpected error occurred.";
const DEFAULT_CAUSE_DEPTH = 3;

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(error: unknown, options: ErrorFormatOptions = {}): ErrorFormatLine[] {
  const summary = summarize(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: summary.title }];
  const push = (kind: ErrorFormatLineKind, text: string | undefined): void => {
    if (text) lines.push({ kind, text });
  };

  if (summary.message !== summary.title) push("message", summary.message);
  push("hint", summary.hint);
  push("next", summary.next);

  const report = carriedReport(error) ?? carriedReport(summary.cause);
  if (report && report.total > 0) push("report", summarizeReport(report));

  if (options.mode !== "debug") return lines;

  push("code", summary.code);
  push("name", errorName(error) ?? errorName(summary.cause));
  for (const text of causeChain(summary.cause, options.maxCauseDepth ?? DEFAULT_CAUSE_DEPTH)) {
    if (text !== summary.message) push("cause", text);
  }
  push("stack", errorStack(error) ?? errorStack(summary.cause));

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return clean(error.message) ?? clean(error.name) ?? String(error);
  }
  if (typeof error === "string") return error;
  if (error !== null && typeof error === "object" && "message" in error) {
    const { message } = error;
    const text = typeof message === "string" ? clean(message) : undefined;
    if (text) return text;
  }
  return String(error);
}

// "3 conflicts recorded before the failure (dropped-unit: 1, missing-dependency: 2)"
export function summarizeReport(report: Pick<ConflictReportSnapshot, "total" | "counts">): string {
  const kinds = Object.entries(report.counts)
    .sort(([left], [right]) => compareText(left, right))
    .map(([kind, count]) => `${kind}: ${count ?? 0}`);
  const noun = report.total === 1 ? "conflict" : "conflicts";
  return `${report.total} ${noun} recorded before the failure (${kinds.join(", ")})`;
}

// =============================================================================
// ANSI STYLING
// =============================================================================

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
};

const SGR: Record<AnsiStyle, number> = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    const open = styles.map((style) => `\x1b[${SGR[style]}m`).join("");
    return `${open}${value}\x1b[0m`;
  };
}

// https://no-color.org: any non-empty NO_COLOR turns styling off.
export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const env = options.env ?? process.env;
  if (options.useColor === false || stream.isTTY !== true) return false;
  return !env.NO_COLOR;
}

// =============================================================================
// INTERNALS
// =============================================================================

function summarize(error: unknown): ErrorSummary {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: clean(error.title) ?? UNEXPECTED_TITLE,
      message: clean(error.message) ?? UNEXPECTED_MESSAGE,
      hint: clean(error.hint),
      next: clean(error.next),
      cause: error.cause,
    };
  }

  const message = error === null || error === undefined ? undefined : clean(formatErrorMessage(error));
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: UNEXPECTED_TITLE,
    message: message ?? UNEXPECTED_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

// Messages of the cause and its own causes, outermost first.
function causeChain(cause: unknown, maxDepth: number): string[] {
  const texts: string[] = [];
  let current = cause;
  while (current !== undefined && current !== null && texts.length < maxDepth) {
    texts.push(formatErrorMessage(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return texts;
}

function carriedReport(value: unknown): ConflictReportSnapshot | null {
  return value instanceof EngineError ? value.report : null;
}

function clean(value: string | undefined): string | undefined {
  const text = value?.trim();
  return text ? text : undefined;
}

function errorName(value: unknown): string | undefined {
  return value instanceof Error ? clean(value.name) : undefined;
}

function errorStack(value: unknown): string | undefined {
  return value instanceof Error && value.stack ? value.stack : undefined;
}
