import { describe, expect, it } from "vitest";

import { defaultEngineConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";
import { LicensePolicy } from "../license/policy.js";

import { makeRepository } from "./engine.test-helpers.js";
import { LicenseIncompatibleCycleError, MergeAbortedError } from "./errors.js";
import { merge } from "./merge.js";

// =============================================================================
// FIXTURES
// =============================================================================

const POLICY = new LicensePolicy({
  MIT: { permissiveness_rank: 90, combinable_with: ["ISC"] },
  ISC: { permissiveness_rank: 90, combinable_with: ["MIT"] },
  "lic-a": { permissiveness_rank: 1, combinable_with: [] },
  "lic-b": { permissiveness_rank: 1, combinable_with: [] },
});

const ADD = "export function add(a: number, b: number): number {\n  return a + b;\n}\n";

const PING = "export function ping(n: number): number { return n > 0 ? pong(n - 1) : 0; }";
const PONG = "export function pong(n: number): number { return n > 0 ? ping(n - 1) : n + 1; }";

// =============================================================================
// TESTS
// =============================================================================

describe("merge", () => {
  it("emits one attributed copy of an exact duplicate", async () => {
    const repositories = [
      makeRepository("alpha", { "src/math.ts": ADD }, { trustRank: 2, licenseId: "MIT", licenseText: "MIT License" }),
      makeRepository("beta", { "src/math.ts": ADD }, { trustRank: 1, licenseId: "ISC", licenseText: "ISC License" }),
    ];
    const logger = new MemoryLogger("test-run");

    const result = await merge(repositories, defaultEngineConfig(), { policy: POLICY, logger });

    expect(result.output).toBe(
      [
        "/*",
        " * Third-party notices for the merged library.",
        " *",
        " * alpha (MIT)",
        " * MIT License",
        " *",
        " * beta (ISC)",
        " * ISC License",
        " */",
        "",
        "/*",
        " * Merged declaration: add",
        " * - alpha (MIT): src/math.ts",
        " * - beta (ISC): src/math.ts",
        " */",
        "export function add(a: number, b: number): number {",
        "  return a + b;",
        "}",
        "",
      ].join("\n"),
    );
    expect(result.status).toBe("clean");
    expect(result.stats).toMatchObject({
      repositories: 2,
      units: 2,
      declarations: 2,
      groups: 1,
      canonicals: 1,
      renamed: 0,
      emitted: 1,
    });
    expect(result.unit.declarations[0]?.attribution.map((origin) => origin.repositoryId)).toEqual(["alpha", "beta"]);
    expect(logger.eventsOfType("merge.complete")).toHaveLength(1);
  });

  it("renames colliding declarations from less trusted repositories and rewrites their callers", async () => {
    const repositories = [
      makeRepository(
        "alpha",
        { "src/util.ts": 'export function util(): string {\n  return "alpha";\n}\n' },
        { trustRank: 2, licenseId: "MIT" },
      ),
      makeRepository(
        "beta",
        {
          "src/util.ts": [
            "export function util(): number[] {\n  return [1, 2, 3];\n}",
            "export function useUtil(): number {\n  return util().length;\n}",
            "",
          ].join("\n"),
        },
        { trustRank: 1, licenseId: "ISC" },
      ),
    ];

    const result = await merge(repositories, defaultEngineConfig(), { policy: POLICY });

    expect(result.unit.declarations.map((declaration) => declaration.name).sort()).toEqual([
      "useUtil",
      "util",
      "util_beta",
    ]);
    expect(result.stats.renamed).toBe(1);
    expect(result.output).toContain("export function useUtil(): number {\n  return util_beta().length;\n}");
    expect(result.output).toContain('export function util(): string {\n  return "alpha";\n}');
  });

  it("credits imported libraries and keeps absorbed exports as aliases", async () => {
    const repositories = [
      makeRepository(
        "alpha",
        {
          "src/ids.ts": [
            'import { z } from "zod";',
            "export type UserId = string;",
            "export type OrderId = string;",
            "export const idSchema = z.string();",
          ].join("\n"),
        },
        { licenseId: "MIT", licenseText: "MIT License" },
      ),
    ];
    const logger = new MemoryLogger("test-run");

    const result = await merge(repositories, defaultEngineConfig(), { policy: POLICY, logger });

    expect(result.status).toBe("clean");
    expect(result.unit.libraries).toEqual([{ name: "zod", specifiers: ["zod"], repositories: ["alpha"] }]);
    expect(result.output.split("\n")).toContain(" * - zod: alpha");
    expect(result.output.endsWith("\n\nexport { OrderId as UserId };\n")).toBe(true);
    expect(logger.eventsOfType("library.usage")).toHaveLength(1);
  });

  it("rejects a license-incompatible cycle and carries the report", async () => {
    const repositories = [
      makeRepository("alpha", { "src/game.ts": `/** Serve. */\n${PING}\n${PONG}\n` }, { licenseId: "lic-a" }),
      makeRepository("beta", { "src/game.ts": `${PING}\n/** Return. */\n${PONG}\n` }, { licenseId: "lic-b" }),
    ];

    const error = await merge(repositories, defaultEngineConfig({ near_duplicate_threshold: 0 }), {
      policy: POLICY,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LicenseIncompatibleCycleError);
    const report = error instanceof LicenseIncompatibleCycleError ? error.report : null;
    expect(report?.counts).toEqual({ "license-incompatible-cycle": 1 });
    expect(report?.entries[0]).toMatchObject({ kind: "license-incompatible-cycle", fatal: true });
  });

  it("turns an aborted signal into MergeAbortedError", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      merge([makeRepository("alpha", { "src/math.ts": ADD })], defaultEngineConfig(), {
        policy: POLICY,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(MergeAbortedError);
  });

  it("refuses repositories that share an id", async () => {
    const repositories = [makeRepository("alpha", {}), makeRepository("alpha", {})];

    await expect(merge(repositories, defaultEngineConfig(), { policy: POLICY })).rejects.toBeInstanceOf(ConfigError);
  });
});
