// Dead-code elimination.
// Removes declarations nothing references, unless they are exported or named as export roots.
// Repeats until a round removes nothing, since a removal can orphan its own dependencies.

import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { logEngineEvent } from "../../../core/logger.js";
import type { MergedDeclaration, MergedImport, MergedUnit } from "../../model/schema.js";
import type { OptimizationPass, PassContext } from "../types.js";

export class DeadCodePass implements OptimizationPass {
  readonly name = "dead-code" as const;

  async transform(unit: MergedUnit, ctx: PassContext): Promise<MergedUnit> {
    let declarations = unit.declarations;
    let round = 0;

    while (true) {
      ctx.signal.throwIfAborted();
      const inbound = countInbound(declarations);
      const survivors = declarations.filter(
        (declaration) =>
          (inbound.get(declaration.id) ?? 0) > 0 ||
          declaration.exported ||
          ctx.exportRoots.has(declaration.name) ||
          ctx.exportRoots.has(declaration.originalName),
      );

      round += 1;
      const removed = declarations.filter((declaration) => !survivors.includes(declaration));
      if (removed.length === 0) break;

      logEngineEvent(ctx.logger, "pass.dead_code.round", {
        round,
        removed: removed.map((declaration) => declaration.name),
      });
      declarations = survivors;
      await yieldToEventLoop();
    }

    return { ...unit, declarations, imports: pruneImports(unit.imports, declarations) };
  }
}

// Self-references do not keep a declaration alive.
export function countInbound(declarations: readonly MergedDeclaration[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const declaration of declarations) {
    for (const target of declaration.dependsOn) {
      if (target === declaration.id) continue;
      counts.set(target, (counts.get(target) ?? 0) + 1);
    }
  }
  return counts;
}

function pruneImports(
  imports: readonly MergedImport[],
  declarations: readonly MergedDeclaration[],
): MergedImport[] {
  const used = new Set(declarations.flatMap((declaration) => declaration.externalUses));
  return imports
    .map((item) => ({
      ...item,
      defaultLocal: item.defaultLocal !== null && used.has(item.defaultLocal) ? item.defaultLocal : null,
      namespaceLocals: item.namespaceLocals.filter((local) => used.has(local)),
      named: item.named.filter((binding) => used.has(binding.local)),
    }))
    .filter(
      (item) =>
        item.sideEffect ||
        item.defaultLocal !== null ||
        item.namespaceLocals.length > 0 ||
        item.named.length > 0,
    );
}
