// Third-party library credits.
// Purpose: which packages the merged code imports and which repositories' surviving declarations bring them in.

import { isBuiltin } from "node:module";

import { logEngineEvent, type EventLogger } from "../../core/logger.js";
import { compareText } from "../../core/utils.js";
import type { CanonicalDeclaration, DeclarationEntry, LibraryUsage } from "../model/schema.js";

export type LibraryUse = {
  specifier: string;
  repositoryId: string;
  declaration: number;
};

// One use per (canonical, external specifier); side-effect imports count for every canonical of their unit.
export function collectLibraryUses(
  canonicals: readonly CanonicalDeclaration[],
  entries: readonly DeclarationEntry[],
): LibraryUse[] {
  const uses: LibraryUse[] = [];
  for (const canonical of canonicals) {
    const entry = entries[canonical.entry];
    if (!entry) continue;

    const specifiers = new Set<string>();
    for (const binding of entry.unit.imports) {
      if (binding.relative) continue;
      const used =
        binding.kind === "side-effect" ||
        (binding.local !== null && entry.declaration.externalUses.includes(binding.local));
      if (used) specifiers.add(binding.specifier);
    }
    for (const specifier of specifiers) {
      uses.push({ specifier, repositoryId: entry.repository.id, declaration: canonical.index });
    }
  }
  return uses;
}

// Node built-ins are not credited.
export function summarizeLibraries(
  uses: readonly LibraryUse[],
  emitted: ReadonlySet<number>,
): LibraryUsage[] {
  const byName = new Map<string, { specifiers: Set<string>; repositories: Set<string> }>();
  for (const use of uses) {
    if (!emitted.has(use.declaration)) continue;
    const name = packageName(use.specifier);
    if (name === null) continue;

    const current = byName.get(name) ?? { specifiers: new Set<string>(), repositories: new Set<string>() };
    current.specifiers.add(use.specifier);
    current.repositories.add(use.repositoryId);
    byName.set(name, current);
  }

  return Array.from(byName.entries())
    .map(([name, usage]) => ({
      name,
      specifiers: Array.from(usage.specifiers).sort(compareText),
      repositories: Array.from(usage.repositories).sort(compareText),
    }))
    .sort((a, b) => compareText(a.name, b.name));
}

// "lodash/fp" -> "lodash", "@scope/pkg/sub" -> "@scope/pkg"; null for built-ins.
export function packageName(specifier: string): string | null {
  if (isBuiltin(specifier)) return null;
  const segments = specifier.split("/");
  const count = specifier.startsWith("@") ? 2 : 1;
  return segments.slice(0, count).join("/");
}

export function logLibraryUsage(logger: EventLogger, libraries: readonly LibraryUsage[]): void {
  for (const library of libraries) {
    logEngineEvent(logger, "library.usage", {
      library: library.name,
      repositories: library.repositories.length,
      repository_ids: library.repositories,
      shared: library.repositories.length > 1,
    });
  }
}
