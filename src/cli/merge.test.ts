import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, it } from "vitest";

import { UserFacingError } from "../core/errors.js";

import { buildCli } from "./index.js";
import { initCommand } from "./init.js";
import { EXIT_CONFLICTS, mergeCommand } from "./merge.js";
import { reportCommand } from "./report.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const FIXTURES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../test/fixtures/repos");
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function writeFixtureConfig(dir: string): string {
  const configPath = path.join(dir, ".autodeploy", "config.yaml");
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(
    configPath,
    [
      "repositories:",
      "  - id: alpha",
      `    path: ${JSON.stringify(path.join(FIXTURES_DIR, "alpha"))}`,
      "    trust_rank: 2",
      "  - id: beta",
      `    path: ${JSON.stringify(path.join(FIXTURES_DIR, "beta"))}`,
      "    trust_rank: 1",
      "output:",
      "  dir: ../out",
      "",
    ].join("\n"),
    "utf8",
  );
  return configPath;
}

async function runFixtureMerge(dir: string, lines: string[] = []) {
  return mergeCommand(
    { config: writeFixtureConfig(dir), failOnConflicts: true, runId: "test-run", cwd: dir },
    { revision: async () => null, print: (line) => lines.push(line) },
  );
}

// =============================================================================
// TESTS
// =============================================================================

describe("merge command", () => {
  it("writes the merged unit and the conflict report", async () => {
    const dir = makeTempDir("cli-merge-");
    const lines: string[] = [];

    const outcome = await runFixtureMerge(dir, lines);

    expect(outcome.exitCode).toBe(EXIT_CONFLICTS);
    expect(outcome.outputPath).toBe(path.join(dir, "out", "index.ts"));
    expect(outcome.reportPath).toBe(path.join(dir, "out", "conflict-report.json"));
    expect(outcome.result.status).toBe("conflicts");

    const names = outcome.result.unit.declarations.map((declaration) => declaration.name);
    expect([...names].sort()).toEqual(["SCALE", "add", "clamp", "percent"]);
    expect(names.indexOf("percent")).toBeGreaterThan(names.indexOf("clamp"));
    expect(names.indexOf("percent")).toBeGreaterThan(names.indexOf("SCALE"));

    const output = fs.readFileSync(outcome.outputPath, "utf8");
    expect(output).toBe(outcome.result.output);
    expect(output).toContain("\nconst SCALE = 100;\n");
    expect(output).toContain(" * - alpha (MIT): src/math.ts\n * - beta (ISC): src/math.ts\n");

    const report: unknown = JSON.parse(fs.readFileSync(outcome.reportPath, "utf8"));
    expect(report).toMatchObject({
      run_id: "test-run",
      total: 1,
      counts: { "dropped-unit": 1 },
      entries: [{ kind: "dropped-unit", repositoryId: "beta", unitPath: "src/broken.ts" }],
    });

    expect(lines[0]).toBe("Merge test-run finished with status: conflicts");
    expect(lines[1]).toBe("- 6 declaration(s) from 2 repositories -> 4 emitted (5 canonical, 0 renamed)");
    expect(fs.existsSync(path.join(dir, "out", "logs", "engine.jsonl"))).toBe(true);
  });

  it("exits cleanly without --fail-on-conflicts", async () => {
    const dir = makeTempDir("cli-merge-");

    const outcome = await mergeCommand(
      { config: writeFixtureConfig(dir), runId: "test-run", cwd: dir, out: "elsewhere" },
      { revision: async () => null, print: () => undefined },
    );

    expect(outcome.exitCode).toBe(0);
    expect(outcome.outputPath).toBe(path.join(dir, "elsewhere", "index.ts"));
  });
});

describe("report command", () => {
  it("summarizes the last run by kind", async () => {
    const dir = makeTempDir("cli-report-");
    await runFixtureMerge(dir);
    const lines: string[] = [];

    const exitCode = await reportCommand({ out: "out", cwd: dir, failOnConflicts: true }, (line) =>
      lines.push(line),
    );

    expect(exitCode).toBe(EXIT_CONFLICTS);
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^Conflict report test-run \(.+\): 1 entry$/);
    expect(lines[1]).toBe("- dropped-unit: 1");
    expect(lines[2]?.startsWith("  dropped-unit: beta:src/broken.ts (")).toBe(true);
  });

  it("raises a user-facing error when no report exists", async () => {
    const dir = makeTempDir("cli-report-");

    const error = await reportCommand({ out: "out", cwd: dir }, () => undefined).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ title: "Conflict report missing." });
  });
});

describe("init command", () => {
  it("creates the config once and overwrites only with --force", () => {
    const dir = makeTempDir("cli-init-");
    const configPath = path.join(dir, ".autodeploy", "config.yaml");
    const lines: string[] = [];
    const print = (line: string) => lines.push(line);

    initCommand({ cwd: dir }, print);
    initCommand({ cwd: dir }, print);
    initCommand({ cwd: dir, force: true }, print);

    expect(lines).toEqual([
      `Created AutoDeploy config at ${configPath}`,
      `Edit ${configPath} to list the repositories to merge.`,
      `Config already exists at ${configPath}`,
      `Overwrote AutoDeploy config at ${configPath}`,
    ]);
  });
});

describe("buildCli", () => {
  it("registers the top-level commands", () => {
    const program = buildCli();

    expect(program.name()).toBe("autodeploy");
    expect(program.commands.map((command) => command.name())).toEqual(["init", "merge", "report"]);
  });
});
