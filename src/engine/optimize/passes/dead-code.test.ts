import { describe, expect, it } from "vitest";

import { MemoryLogger } from "../../../core/logger.js";
import { mergedDeclaration } from "../../engine.test-helpers.js";
import type { MergedUnit } from "../../model/schema.js";
import type { PassContext } from "../types.js";

import { countInbound, DeadCodePass } from "./dead-code.js";

function context(exportRoots: string[] = []): PassContext & { logger: MemoryLogger } {
  return {
    signal: new AbortController().signal,
    logger: new MemoryLogger("test-run"),
    exportRoots: new Set(exportRoots),
  };
}

describe("DeadCodePass", () => {
  const unit: MergedUnit = {
    declarations: [
      mergedDeclaration({ id: 0, name: "main", exported: true, dependsOn: [1] }),
      mergedDeclaration({ id: 1, name: "helper", externalUses: ["z"] }),
      mergedDeclaration({ id: 2, name: "orphan", dependsOn: [3], externalUses: ["_"] }),
      mergedDeclaration({ id: 3, name: "leaf" }),
      mergedDeclaration({ id: 4, name: "rooted" }),
      mergedDeclaration({ id: 5, name: "selfish", dependsOn: [5] }),
    ],
    imports: [
      {
        specifier: "lodash",
        defaultLocal: "_",
        namespaceLocals: [],
        named: [],
        sideEffect: false,
      },
      { specifier: "reflect-metadata", defaultLocal: null, namespaceLocals: [], named: [], sideEffect: true },
      {
        specifier: "zod",
        defaultLocal: null,
        namespaceLocals: [],
        named: [{ imported: "z", local: "z", typeOnly: false }],
        sideEffect: false,
      },
    ],
    aliases: [],
    libraries: [],
    notices: [],
    profile: null,
  };

  it("removes unreferenced declarations until nothing else becomes unreachable", async () => {
    const ctx = context(["rooted"]);

    const result = await new DeadCodePass().transform(unit, ctx);

    expect(result.declarations.map((declaration) => declaration.name)).toEqual(["main", "helper", "rooted"]);
    expect(ctx.logger.eventsOfType("pass.dead_code.round").map((event) => event.removed)).toEqual([
      ["orphan", "selfish"],
      ["leaf"],
    ]);
  });

  it("drops imports only removed declarations used", async () => {
    const result = await new DeadCodePass().transform(unit, context(["rooted"]));

    expect(result.imports.map((item) => item.specifier)).toEqual(["reflect-metadata", "zod"]);
  });

  it("keeps every exported declaration", async () => {
    const exported: MergedUnit = {
      ...unit,
      declarations: unit.declarations.map((declaration) => ({ ...declaration, exported: true })),
    };

    const result = await new DeadCodePass().transform(exported, context());

    expect(result.declarations).toHaveLength(6);
  });
});

describe("countInbound", () => {
  it("ignores self references", () => {
    const counts = countInbound([
      mergedDeclaration({ id: 0, name: "a", dependsOn: [0, 1] }),
      mergedDeclaration({ id: 1, name: "b", dependsOn: [1] }),
    ]);

    expect(Array.from(counts.entries())).toEqual([[1, 1]]);
  });
});
