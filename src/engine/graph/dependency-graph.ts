// Dependency graph builder.
// Purpose: resolve declaration references onto canonicals, vet cycles against the license policy and order emission.
// Assumes nodes are canonical indices; every edge points from the referencing canonical to the referenced one.

import path from "node:path";

import { logEngineEvent, type EventLogger } from "../../core/logger.js";
import { compareDescending, compareText } from "../../core/utils.js";
import type { LicensePolicy } from "../../license/policy.js";
import { LicenseIncompatibleCycleError } from "../errors.js";
import type {
  CanonicalDeclaration,
  DeclarationEntry,
  DeclarationReference,
  DependencyEdge,
  SourceUnit,
} from "../model/schema.js";
import type { ConflictReport } from "../report/conflict-report.js";
import { originOf } from "../resolve/overlap-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type DependencyGraphInput = {
  entries: readonly DeclarationEntry[];
  canonicals: readonly CanonicalDeclaration[];
  canonicalOfEntry: readonly number[];
  policy: LicensePolicy;
  allowIncompatibleCycles: boolean;
  report: ConflictReport;
  logger: EventLogger;
};

export type DependencyGraph = {
  size: number;
  edges: DependencyEdge[];
  dependencies: number[][];
  dependents: number[][];
  // Reference local name -> canonical index, per canonical. Unresolved references are absent.
  resolved: Array<Map<string, number>>;
  components: number[][];
  cycles: number[][];
  order: number[];
};

const RESOLVE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
const JS_TO_TS_EXTENSIONS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildDependencyGraph(input: DependencyGraphInput): DependencyGraph {
  const size = input.canonicals.length;
  const lookup = new DeclarationLookup(input.entries);
  const dependencies: Array<Set<number>> = Array.from({ length: size }, () => new Set<number>());
  const resolved: Array<Map<string, number>> = Array.from({ length: size }, () => new Map());

  for (const canonical of input.canonicals) {
    const entry = input.entries[canonical.entry];
    if (!entry) continue;

    for (const reference of entry.declaration.references) {
      const targetEntry = lookup.resolve(entry, reference);
      if (targetEntry === null) {
        input.report.add({
          kind: "missing-dependency",
          declaration: originOf(entry),
          reference: reference.local,
          specifier: reference.specifier,
        });
        continue;
      }

      const target = input.canonicalOfEntry[targetEntry];
      if (target === undefined || target < 0) continue;
      dependencies[canonical.index]?.add(target);
      resolved[canonical.index]?.set(reference.local, target);
    }
  }

  const dependencyLists = dependencies.map((targets) => Array.from(targets).sort((a, b) => a - b));
  const dependents: number[][] = Array.from({ length: size }, () => []);
  const edges: DependencyEdge[] = [];
  dependencyLists.forEach((targets, from) => {
    for (const to of targets) {
      edges.push({ from, to });
      dependents[to]?.push(from);
    }
  });

  const components = stronglyConnectedComponents(dependencyLists);
  const cycles = components.filter(
    (component) =>
      component.length > 1 ||
      (component.length === 1 && component[0] !== undefined && dependencies[component[0]]?.has(component[0]) === true),
  );

  for (const cycle of cycles) {
    vetCycle(cycle, input);
  }

  const compare = createSourceOrderComparator(input);
  const order = orderComponents(components, dependencyLists, compare);

  return {
    size,
    edges,
    dependencies: dependencyLists,
    dependents,
    resolved,
    components,
    cycles,
    order,
  };
}

// Iterative Tarjan over an explicit call stack; components come out in reverse topological order.
export function stronglyConnectedComponents(adjacency: readonly (readonly number[])[]): number[][] {
  const count = adjacency.length;
  const indexOf = new Array<number>(count).fill(-1);
  const lowLink = new Array<number>(count).fill(0);
  const onStack = new Array<boolean>(count).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let nextIndex = 0;

  for (let root = 0; root < count; root += 1) {
    if (indexOf[root] !== -1) continue;

    const callStack: Array<{ node: number; edge: number }> = [{ node: root, edge: 0 }];
    indexOf[root] = lowLink[root] = nextIndex++;
    stack.push(root);
    onStack[root] = true;

    while (callStack.length > 0) {
      const frame = callStack[callStack.length - 1];
      if (!frame) break;
      const neighbors = adjacency[frame.node] ?? [];

      if (frame.edge < neighbors.length) {
        const next = neighbors[frame.edge] ?? -1;
        frame.edge += 1;
        if (next < 0) continue;
        if (indexOf[next] === -1) {
          indexOf[next] = lowLink[next] = nextIndex++;
          stack.push(next);
          onStack[next] = true;
          callStack.push({ node: next, edge: 0 });
        } else if (onStack[next]) {
          lowLink[frame.node] = Math.min(lowLink[frame.node] ?? 0, indexOf[next] ?? 0);
        }
        continue;
      }

      callStack.pop();
      const parent = callStack[callStack.length - 1];
      if (parent) {
        lowLink[parent.node] = Math.min(lowLink[parent.node] ?? 0, lowLink[frame.node] ?? 0);
      }

      if (lowLink[frame.node] === indexOf[frame.node]) {
        const component: number[] = [];
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          component.push(member);
        } while (member !== frame.node);
        components.push(component.sort((a, b) => a - b));
      }
    }
  }

  return components;
}

// =============================================================================
// REFERENCE RESOLUTION
// =============================================================================

class DeclarationLookup {
  private readonly units = new Map<string, Map<string, SourceUnit>>();
  private readonly byName = new Map<string, number>();
  private readonly defaults = new Map<string, number>();

  constructor(entries: readonly DeclarationEntry[]) {
    for (const entry of entries) {
      const repositoryId = entry.repository.id;
      let units = this.units.get(repositoryId);
      if (!units) {
        units = new Map();
        this.units.set(repositoryId, units);
      }
      units.set(entry.unit.path, entry.unit);

      const key = unitKey(repositoryId, entry.unit.path);
      const nameKey = `${key}\u0000${entry.declaration.name}`;
      if (!this.byName.has(nameKey)) this.byName.set(nameKey, entry.index);
      if (entry.declaration.defaultExport && !this.defaults.has(key)) {
        this.defaults.set(key, entry.index);
      }
    }
  }

  // Same unit, then the unit a relative import names, then any unit of the repository in path order.
  resolve(entry: DeclarationEntry, reference: DeclarationReference): number | null {
    const repositoryId = entry.repository.id;

    if (reference.specifier === null) {
      return this.find(repositoryId, entry.unit.path, reference.target);
    }

    const targetPath = this.resolveSpecifier(repositoryId, entry.unit.path, reference.specifier);
    if (targetPath !== null) {
      const found = this.find(repositoryId, targetPath, reference.target);
      if (found !== null) return found;
    }

    if (reference.target === "default") return null;

    const units = Array.from(this.units.get(repositoryId)?.keys() ?? []).sort(compareText);
    for (const unitPath of units) {
      const found = this.find(repositoryId, unitPath, reference.target);
      if (found !== null) return found;
    }
    return null;
  }

  private find(repositoryId: string, unitPath: string, name: string): number | null {
    const key = unitKey(repositoryId, unitPath);
    if (name === "default") {
      return this.defaults.get(key) ?? null;
    }
    return this.byName.get(`${key}\u0000${name}`) ?? null;
  }

  private resolveSpecifier(repositoryId: string, fromPath: string, specifier: string): string | null {
    const units = this.units.get(repositoryId);
    if (!units) return null;

    const base = specifier.startsWith("/")
      ? path.posix.normalize(specifier.slice(1))
      : path.posix.normalize(path.posix.join(path.posix.dirname(fromPath), specifier));

    const extension = path.posix.extname(base);
    const stem = extension ? base.slice(0, -extension.length) : base;
    const candidates = [
      base,
      ...(JS_TO_TS_EXTENSIONS[extension] ?? []).map((swap) => `${stem}${swap}`),
      ...RESOLVE_EXTENSIONS.map((ext) => `${base}${ext}`),
      ...RESOLVE_EXTENSIONS.map((ext) => `${base}/index${ext}`),
    ];

    return candidates.find((candidate) => units.has(candidate)) ?? null;
  }
}

function unitKey(repositoryId: string, unitPath: string): string {
  return `${repositoryId}\u0000${unitPath}`;
}

// =============================================================================
// CYCLES
// =============================================================================

function vetCycle(cycle: number[], input: DependencyGraphInput): void {
  const members = cycle
    .map((index) => input.canonicals[index])
    .map((canonical) => (canonical ? input.entries[canonical.entry] : undefined))
    .filter((entry): entry is DeclarationEntry => entry !== undefined);

  const repositories = Array.from(new Set(members.map((entry) => entry.repository.id))).sort(compareText);
  logEngineEvent(input.logger, "graph.cycle", {
    declarations: members.map((entry) => entry.declaration.name),
    repositories,
  });
  if (repositories.length < 2) return;

  const incompatible = input.policy.incompatiblePairs(members.map((entry) => entry.repository.license.id));
  if (incompatible.length === 0) return;

  const fatal = !input.allowIncompatibleCycles;
  input.report.add({
    kind: "license-incompatible-cycle",
    declarations: members.map(originOf),
    repositories,
    incompatible,
    fatal,
  });

  if (fatal) {
    throw new LicenseIncompatibleCycleError(
      members.map((entry) => `${entry.repository.id}:${entry.declaration.name}`),
      incompatible,
    );
  }
}

// =============================================================================
// EMISSION ORDER
// =============================================================================

type CanonicalComparator = (a: number, b: number) => number;

// Higher-trust repositories first, then source position.
function createSourceOrderComparator(input: DependencyGraphInput): CanonicalComparator {
  const entryOf = (index: number): DeclarationEntry | undefined => {
    const canonical = input.canonicals[index];
    return canonical ? input.entries[canonical.entry] : undefined;
  };

  return (a, b) => {
    const left = entryOf(a);
    const right = entryOf(b);
    if (!left || !right) return a - b;
    return (
      compareDescending(left.repository.trustRank, right.repository.trustRank) ||
      compareText(left.repository.id, right.repository.id) ||
      compareText(left.unit.path, right.unit.path) ||
      left.declaration.start - right.declaration.start ||
      a - b
    );
  };
}

// Kahn over the condensation: a component is ready once every component it depends on is emitted.
function orderComponents(
  components: number[][],
  dependencies: readonly (readonly number[])[],
  compare: CanonicalComparator,
): number[] {
  const componentOf = new Map<number, number>();
  components.forEach((members, id) => {
    for (const member of members) componentOf.set(member, id);
  });

  const sorted = components.map((members) => [...members].sort(compare));
  const head = (id: number): number => sorted[id]?.[0] ?? -1;
  const compareComponents = (a: number, b: number): number => compare(head(a), head(b));

  const pending = new Array<number>(components.length).fill(0);
  const dependentsOf: Array<Set<number>> = components.map(() => new Set<number>());
  components.forEach((members, id) => {
    const upstream = new Set<number>();
    for (const member of members) {
      for (const target of dependencies[member] ?? []) {
        const targetComponent = componentOf.get(target);
        if (targetComponent !== undefined && targetComponent !== id) upstream.add(targetComponent);
      }
    }
    pending[id] = upstream.size;
    for (const source of upstream) dependentsOf[source]?.add(id);
  });

  const ready: number[] = [];
  pending.forEach((count, id) => {
    if (count === 0) insertSorted(ready, id, compareComponents);
  });

  const order: number[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) break;
    order.push(...(sorted[id] ?? []));
    for (const dependent of dependentsOf[id] ?? []) {
      const remaining = (pending[dependent] ?? 0) - 1;
      pending[dependent] = remaining;
      if (remaining === 0) insertSorted(ready, dependent, compareComponents);
    }
  }

  return order;
}

function insertSorted(list: number[], value: number, compare: (a: number, b: number) => number): void {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    const current = list[mid];
    if (current !== undefined && compare(current, value) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  list.splice(low, 0, value);
}
