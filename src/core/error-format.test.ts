import { describe, expect, it } from "vitest";

import { LicenseIncompatibleCycleError } from "../engine/errors.js";
import { ConflictReport } from "../engine/report/conflict-report.js";

import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  resolveColorEnabled,
  summarizeReport,
} from "./error-format.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "Missing repositories",
      hint: "Run autodeploy init",
      next: "Edit .autodeploy/config.yaml",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Config error");
    expect(lines[1]?.text).toBe("Missing repositories");
  });

  it("omits the message when it repeats the title", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.merge,
      title: "Merge failed.",
      message: "Merge failed.",
    });

    expect(formatErrorLines(error)).toEqual([{ kind: "title", text: "Merge failed." }]);
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.merge,
      title: "Merge failed",
      message: "Pass exceeded budget",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.some((line) => line.kind === "code" && line.text === "MERGE_ERROR")).toBe(true);
    expect(lines.some((line) => line.kind === "name" && line.text === "UserFacingError")).toBe(
      true,
    );
    expect(lines.some((line) => line.kind === "cause" && line.text === "boom")).toBe(true);

    const stack = lines.find((line) => line.kind === "stack");
    expect(stack?.text).toContain("UserFacingError");
  });

  it("walks the cause chain in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config unreadable.",
      message: "Failed to read YAML.",
      cause: new ConfigError("Invalid YAML in config.yaml.", new Error("Unexpected end of flow sequence")),
    });

    const causes = formatErrorLines(error, { mode: "debug" })
      .filter((line) => line.kind === "cause")
      .map((line) => line.text);

    expect(causes).toEqual(["Invalid YAML in config.yaml.", "Unexpected end of flow sequence"]);
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });

  it("summarizes the conflict report carried by an engine error", () => {
    const report = new ConflictReport("test-run");
    report.add({ kind: "dropped-unit", repositoryId: "beta", unitPath: "src/broken.ts", message: "';' expected." });
    const cause = new LicenseIncompatibleCycleError(["alpha:ping", "beta:pong"], [["lic-a", "lic-b"]]).attachReport(
      report.snapshot(),
    );
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.license,
      title: "License-incompatible dependency cycle.",
      message: cause.message,
      cause,
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "report"]);
    expect(lines[2]?.text).toBe("1 conflict recorded before the failure (dropped-unit: 1)");
  });

  it("keeps plain error messages", () => {
    const lines = formatErrorLines(new ConfigError("bad threshold"));

    expect(lines).toEqual([
      { kind: "title", text: "Unexpected error" },
      { kind: "message", text: "bad threshold" },
    ]);
  });
});

describe("formatErrorMessage", () => {
  it("reads message fields from error-like objects", () => {
    expect(formatErrorMessage({ message: "  nope  " })).toBe("nope");
    expect(formatErrorMessage(42)).toBe("42");
  });
});

describe("summarizeReport", () => {
  it("lists kinds alphabetically", () => {
    expect(summarizeReport({ total: 3, counts: { "missing-dependency": 2, "dropped-unit": 1 } })).toBe(
      "3 conflicts recorded before the failure (dropped-unit: 1, missing-dependency: 2)",
    );
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false }, env: {} })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: {} })).toBe(true);
  });

  it("respects explicit useColor flags and NO_COLOR", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false, env: {} })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: true, env: {} })).toBe(true);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: { NO_COLOR: "1" } })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    const format = createAnsiFormatter(false);
    expect(format("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);
    expect(format("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
