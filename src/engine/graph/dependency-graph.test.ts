import { describe, expect, it } from "vitest";

import { canonicalName, makeRepository, prepareMerge, testPolicy } from "../engine.test-helpers.js";
import { LicenseIncompatibleCycleError } from "../errors.js";

import { stronglyConnectedComponents } from "./dependency-graph.js";

// Same rank, so the longer (documented) copy wins each group and the winners alternate repositories.
const CYCLE_POLICY = testPolicy({
  "lic-a": { permissiveness_rank: 1, combinable_with: [] },
  "lic-b": { permissiveness_rank: 1, combinable_with: [] },
});

const PING = "export function ping(n: number): number { return n > 0 ? pong(n - 1) : 0; }";
const PONG = "export function pong(n: number): number { return n > 0 ? ping(n - 1) : n + 1; }";

function cycleRepositories() {
  return [
    makeRepository("alpha", { "src/game.ts": `/** Serve. */\n${PING}\n${PONG}\n` }, { licenseId: "lic-a" }),
    makeRepository("beta", { "src/game.ts": `${PING}\n/** Return. */\n${PONG}\n` }, { licenseId: "lic-b" }),
  ];
}

describe("buildDependencyGraph", () => {
  it("resolves relative imports and orders dependencies first", () => {
    const prepared = prepareMerge([
      makeRepository("alpha", {
        "src/a.ts": 'import { helper } from "./b.js";\nexport function main() { return helper(); }\n',
        "src/b.ts": "export function helper() { return 1; }\n",
      }),
    ]);

    const names = prepared.graph.order.map((index) => canonicalName(prepared, index));
    expect(names).toEqual(["alpha:helper", "alpha:main"]);
    expect(prepared.graph.edges).toHaveLength(1);
    expect(prepared.graph.cycles).toEqual([]);
    expect(prepared.report.hasConflicts()).toBe(false);
  });

  it("reports references that resolve nowhere", () => {
    const prepared = prepareMerge([
      makeRepository("alpha", {
        "src/use.ts": 'import { gone } from "./missing";\nexport function use() { return gone(); }\n',
      }),
    ]);

    expect(prepared.report.ofKind("missing-dependency")).toEqual([
      {
        kind: "missing-dependency",
        declaration: { repositoryId: "alpha", unitPath: "src/use.ts", name: "use" },
        reference: "gone",
        specifier: "./missing",
      },
    ]);
    expect(prepared.graph.edges).toEqual([]);
  });

  it("allows cycles inside one repository", () => {
    const prepared = prepareMerge([makeRepository("alpha", { "src/game.ts": `${PING}\n${PONG}\n` })]);

    expect(prepared.graph.cycles).toHaveLength(1);
    expect(prepared.graph.cycles[0]).toHaveLength(2);
    expect(prepared.report.hasConflicts()).toBe(false);
    expect(prepared.graph.order).toHaveLength(2);
  });

  it("fails on a cross-repository cycle with incompatible licenses", () => {
    let error: unknown;
    try {
      prepareMerge(cycleRepositories(), { policy: CYCLE_POLICY });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(LicenseIncompatibleCycleError);
    expect(error instanceof LicenseIncompatibleCycleError ? error.incompatible : []).toEqual([["lic-a", "lic-b"]]);
  });

  it("reports the cycle instead when incompatible cycles are allowed", () => {
    const prepared = prepareMerge(cycleRepositories(), {
      policy: CYCLE_POLICY,
      allowIncompatibleCycles: true,
    });

    const conflicts = prepared.report.ofKind("license-incompatible-cycle");
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.repositories).toEqual(["alpha", "beta"]);
    expect(conflicts[0]?.fatal).toBe(false);
    expect(prepared.graph.cycles).toHaveLength(1);
    expect(
      prepared.graph.cycles[0]?.map((index) => canonicalName(prepared, index)).sort(),
    ).toEqual(["alpha:ping", "beta:pong"]);
  });
});

describe("stronglyConnectedComponents", () => {
  it("finds cycles and singletons", () => {
    expect(stronglyConnectedComponents([[1], [2], [0], []])).toEqual([[0, 1, 2], [3]]);
  });

  it("emits components in reverse topological order", () => {
    expect(stronglyConnectedComponents([[1], [2], []])).toEqual([[2], [1], [0]]);
  });
});
