// Namespace reconciliation.
// Purpose: give every surviving canonical a unique name and rewrite reference sites to the final names.
// Assumes the dependency graph was built from the same canonicals; graph.order is the emission order.

import { logEngineEvent, type EventLogger } from "../../core/logger.js";
import { compareText } from "../../core/utils.js";
import type { LicensePolicy } from "../../license/policy.js";
import { UnresolvedReferenceError } from "../errors.js";
import type { DependencyGraph } from "../graph/dependency-graph.js";
import type {
  CanonicalDeclaration,
  DeclarationEntry,
  MergedAlias,
  MergedDeclaration,
  MergedImport,
} from "../model/schema.js";
import { applyReplacements, type TextReplacement } from "../model/text-edit.js";
import type { ConflictReport } from "../report/conflict-report.js";
import { originOf } from "../resolve/overlap-resolver.js";
import { createPriorityComparator } from "../resolve/ranking.js";

import { mergeExternalImports } from "./imports.js";

export type ReconciledDeclaration = Omit<MergedDeclaration, "attribution" | "annotation">;

export type ReconcileInput = {
  entries: readonly DeclarationEntry[];
  canonicals: readonly CanonicalDeclaration[];
  graph: DependencyGraph;
  policy: LicensePolicy;
  report: ConflictReport;
  logger: EventLogger;
};

export type ReconcileResult = {
  declarations: ReconciledDeclaration[];
  imports: MergedImport[];
  aliases: MergedAlias[];
  renamed: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function reconcileNamespace(input: ReconcileInput): ReconcileResult {
  const winners = input.canonicals.map((canonical) => entryAt(input.entries, canonical.entry));
  const importLocals = new Set(winners.flatMap((entry) => entry.declaration.externalUses));
  const finalNames = assignFinalNames(winners, input, importLocals);
  const renamed = finalNames.filter((name, index) => name !== winners[index]?.declaration.name).length;

  const declarations = input.graph.order.map((index): ReconciledDeclaration => {
    const canonical = input.canonicals[index];
    const entry = winners[index];
    if (!canonical || !entry) {
      throw new Error(`Canonical ${index} is missing from the emission order.`);
    }
    const resolved = input.graph.resolved[index] ?? new Map<string, number>();
    const finalName = finalNames[index] ?? entry.declaration.name;

    return {
      id: index,
      name: finalName,
      originalName: entry.declaration.name,
      kind: entry.declaration.kind,
      text: rewriteDeclaration(entry, finalName, resolved, finalNames),
      exported: canonical.exportRoot,
      origin: originOf(entry),
      rejected: canonical.rejected.map((match) => ({ ...match })),
      dependsOn: [...(input.graph.dependencies[index] ?? [])],
      externalUses: [...entry.declaration.externalUses],
    };
  });

  verifyReferences(declarations, importLocals);

  const imports = mergeExternalImports(
    input.graph.order.map((index) => winners[index]).filter((entry): entry is DeclarationEntry => !!entry),
    input.report,
  );
  const aliases = collectAliases(input, finalNames, new Set([...finalNames, ...importLocals]));

  return { declarations, imports, aliases, renamed };
}

// Declarations keep their names unless a higher-priority surviving declaration claims it,
// or an external import binds it; an import local outranks every declaration.
export function assignFinalNames(
  winners: readonly DeclarationEntry[],
  input: Pick<ReconcileInput, "policy" | "logger">,
  importLocals: ReadonlySet<string> = new Set(),
): string[] {
  const compare = createPriorityComparator(input.policy);
  const byName = new Map<string, number[]>();
  winners.forEach((entry, index) => {
    const members = byName.get(entry.declaration.name) ?? [];
    members.push(index);
    byName.set(entry.declaration.name, members);
  });

  const taken = new Set([...byName.keys(), ...importLocals]);
  const finalNames = winners.map((entry) => entry.declaration.name);

  for (const name of Array.from(byName.keys()).sort(compareText)) {
    const members = byName.get(name) ?? [];
    const boundByImport = importLocals.has(name);
    if (members.length < 2 && !boundByImport) continue;

    const ranked = [...members].sort((a, b) => {
      const left = winners[a];
      const right = winners[b];
      return left && right ? compare(left, right) : a - b;
    });

    for (const index of boundByImport ? ranked : ranked.slice(1)) {
      const entry = winners[index];
      if (!entry) continue;
      const base = `${name}_${sanitizeIdentifier(entry.repository.id)}`;
      let candidate = base;
      for (let suffix = 2; taken.has(candidate); suffix += 1) {
        candidate = `${base}_${suffix}`;
      }
      taken.add(candidate);
      finalNames[index] = candidate;
      logEngineEvent(input.logger, "reconcile.rename", {
        from: name,
        to: candidate,
        repository: entry.repository.id,
        unit: entry.unit.path,
        reason: boundByImport ? "import" : "declaration",
      });
    }
  }

  return finalNames;
}

export function sanitizeIdentifier(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_$]+/g, "_").replace(/^_+|_+$/g, "");
  return cleaned.length > 0 ? cleaned : "repo";
}

// =============================================================================
// EXPORT ALIASES
// =============================================================================

// An exported duplicate absorbed under another name keeps its public name as `export { canonical as name }`.
function collectAliases(
  input: Pick<ReconcileInput, "entries" | "canonicals" | "report" | "logger">,
  finalNames: readonly string[],
  taken: Set<string>,
): MergedAlias[] {
  const aliases: MergedAlias[] = [];
  const targetOf = new Map<string, number>();

  for (const canonical of input.canonicals) {
    const winner = entryAt(input.entries, canonical.entry);
    const targetName = finalNames[canonical.index] ?? winner.declaration.name;

    for (const memberIndex of canonical.subsumed) {
      const member = entryAt(input.entries, memberIndex);
      const name = member.declaration.name;
      if (!member.declaration.exported || name === winner.declaration.name || name === targetName) continue;
      if (targetOf.get(name) === canonical.index) continue;

      if (taken.has(name)) {
        input.report.add({ kind: "alias-collision", alias: originOf(member), target: targetName });
        continue;
      }
      taken.add(name);
      targetOf.set(name, canonical.index);
      aliases.push({ name, target: canonical.index });
      logEngineEvent(input.logger, "reconcile.alias", {
        alias: name,
        target: targetName,
        repository: member.repository.id,
        unit: member.unit.path,
      });
    }
  }

  return aliases.sort((a, b) => compareText(a.name, b.name));
}

// =============================================================================
// REWRITING
// =============================================================================

function rewriteDeclaration(
  entry: DeclarationEntry,
  finalName: string,
  resolved: ReadonlyMap<string, number>,
  finalNames: readonly string[],
): string {
  const { declaration } = entry;
  const edits: TextReplacement[] = [];

  if (finalName !== declaration.name) {
    edits.push({ ...declaration.nameSite, text: finalName });
  }

  for (const site of declaration.sites) {
    const target = resolved.get(site.name);
    if (target === undefined) continue;
    const targetName = finalNames[target];
    if (targetName === undefined || targetName === site.name) continue;
    edits.push({
      start: site.start,
      end: site.end,
      text: site.shorthand ? `${site.name}: ${targetName}` : targetName,
    });
  }

  return applyReplacements(declaration.text, edits);
}

// =============================================================================
// VERIFICATION
// =============================================================================

function verifyReferences(
  declarations: readonly ReconciledDeclaration[],
  importLocals: ReadonlySet<string>,
): void {
  const nameCounts = new Map<string, number>();
  const nameOf = new Map<number, string>();
  for (const declaration of declarations) {
    nameCounts.set(declaration.name, (nameCounts.get(declaration.name) ?? 0) + 1);
    nameOf.set(declaration.id, declaration.name);
  }

  for (const declaration of declarations) {
    if (nameCounts.get(declaration.name) !== 1 || importLocals.has(declaration.name)) {
      throw new UnresolvedReferenceError(declaration.name, declaration.name);
    }
    for (const target of declaration.dependsOn) {
      const targetName = nameOf.get(target);
      if (targetName === undefined || nameCounts.get(targetName) !== 1) {
        throw new UnresolvedReferenceError(declaration.name, targetName ?? `#${target}`);
      }
    }
  }
}

function entryAt(entries: readonly DeclarationEntry[], index: number): DeclarationEntry {
  const entry = entries[index];
  if (!entry) {
    throw new Error(`Declaration entry ${index} is not in the arena.`);
  }
  return entry;
}
