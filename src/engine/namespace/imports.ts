// External import merging for the consolidated unit.

import { compareText } from "../../core/utils.js";
import type { DeclarationEntry, ImportBinding, MergedImport } from "../model/schema.js";
import type { ConflictReport } from "../report/conflict-report.js";

export function mergeExternalImports(
  entries: readonly DeclarationEntry[],
  report: ConflictReport,
): MergedImport[] {
  const merged = new Map<string, MergedImport>();
  const localSources = new Map<string, Set<string>>();
  const seenUnits = new Set<string>();

  const importFor = (specifier: string): MergedImport => {
    let current = merged.get(specifier);
    if (!current) {
      current = { specifier, defaultLocal: null, namespaceLocals: [], named: [], sideEffect: false };
      merged.set(specifier, current);
    }
    return current;
  };

  for (const entry of entries) {
    const unitKey = `${entry.repository.id}\u0000${entry.unit.path}`;
    if (!seenUnits.has(unitKey)) {
      seenUnits.add(unitKey);
      for (const binding of entry.unit.imports) {
        if (binding.kind === "side-effect" && !binding.relative) {
          importFor(binding.specifier).sideEffect = true;
        }
      }
    }

    for (const local of entry.declaration.externalUses) {
      const binding = entry.unit.imports.find((item) => item.local === local && !item.relative);
      if (!binding) continue;

      const sources = localSources.get(local) ?? new Set<string>();
      sources.add(binding.specifier);
      localSources.set(local, sources);

      addBinding(importFor(binding.specifier), binding, local);
    }
  }

  for (const [local, sources] of localSources) {
    if (sources.size > 1) {
      report.add({ kind: "import-collision", local, specifiers: Array.from(sources).sort(compareText) });
    }
  }

  return Array.from(merged.values())
    .map((item) => ({
      ...item,
      namespaceLocals: [...item.namespaceLocals].sort(compareText),
      named: [...item.named].sort((a, b) => compareText(a.local, b.local)),
    }))
    .sort((a, b) => compareText(a.specifier, b.specifier));
}

function addBinding(target: MergedImport, binding: ImportBinding, local: string): void {
  if (binding.kind === "namespace") {
    if (!target.namespaceLocals.includes(local)) target.namespaceLocals.push(local);
    return;
  }

  if (binding.kind === "default" && (target.defaultLocal === null || target.defaultLocal === local)) {
    target.defaultLocal = local;
    return;
  }

  const imported = binding.imported ?? local;
  const existing = target.named.find((item) => item.local === local && item.imported === imported);
  if (existing) {
    existing.typeOnly = existing.typeOnly && binding.typeOnly;
    return;
  }
  target.named.push({ imported, local, typeOnly: binding.typeOnly });
}
