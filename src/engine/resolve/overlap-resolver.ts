// Overlap resolution.
// Purpose: choose one canonical declaration per duplicate group; keep low-confidence near matches apart.
// Assumes groups come from buildDuplicateGroups and entry indices point into the declaration arena.

import { logEngineEvent, type EventLogger } from "../../core/logger.js";
import type { LicensePolicy } from "../../license/policy.js";
import type {
  CanonicalDeclaration,
  DeclarationEntry,
  DeclarationOrigin,
  DuplicateCluster,
  DuplicateGroup,
  RejectedNearMatch,
} from "../model/schema.js";
import type { ConflictReport } from "../report/conflict-report.js";

import { createPriorityComparator, pickPreferred, type EntryComparator } from "./ranking.js";

export type OverlapResolutionInput = {
  entries: readonly DeclarationEntry[];
  groups: readonly DuplicateGroup[];
  policy: LicensePolicy;
  autoMergeConfidenceFloor: number;
  report: ConflictReport;
  logger: EventLogger;
};

export type OverlapResolution = {
  canonicals: CanonicalDeclaration[];
  canonicalOfEntry: number[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveOverlaps(input: OverlapResolutionInput): OverlapResolution {
  const compare = createPriorityComparator(input.policy);
  const canonicals: CanonicalDeclaration[] = [];
  const canonicalOfEntry = new Array<number>(input.entries.length).fill(-1);

  const addCanonical = (groupId: number, members: DeclarationEntry[]): CanonicalDeclaration => {
    const ordered = [...members].sort(compare);
    const winner = pickPreferred(ordered, compare);
    const canonical: CanonicalDeclaration = {
      index: canonicals.length,
      entry: winner.index,
      groupId,
      subsumed: ordered.map((entry) => entry.index),
      rejected: [],
      exportRoot: ordered.some((entry) => entry.declaration.exported),
    };
    canonicals.push(canonical);
    for (const entry of ordered) {
      canonicalOfEntry[entry.index] = canonical.index;
    }
    return canonical;
  };

  for (const group of input.groups) {
    const accepted: DeclarationEntry[] = [];
    const rejected: DuplicateCluster[] = [];

    for (const cluster of group.clusters) {
      if (cluster.match === "exact" || cluster.confidence >= input.autoMergeConfidenceFloor) {
        accepted.push(...membersOf(cluster, input.entries));
      } else {
        rejected.push(cluster);
      }
    }

    const primary = addCanonical(group.id, accepted);
    const primaryEntry = entryAt(input.entries, primary.entry);

    for (const cluster of rejected) {
      const split = addCanonical(group.id, membersOf(cluster, input.entries));
      const representative = entryAt(input.entries, split.entry);
      const match: RejectedNearMatch = {
        ...originOf(representative),
        entry: representative.index,
        confidence: cluster.confidence,
      };
      primary.rejected.push(match);
      input.report.add({
        kind: "near-duplicate",
        group: group.id,
        canonical: originOf(primaryEntry),
        rejected: originOf(representative),
        confidence: roundConfidence(cluster.confidence),
      });
    }

    if (primary.subsumed.length > 1 || primary.rejected.length > 0) {
      logEngineEvent(input.logger, "resolve.group", {
        group: group.id,
        canonical: describeEntry(primaryEntry),
        subsumed: primary.subsumed.length,
        rejected: primary.rejected.length,
      });
    }
  }

  return { canonicals, canonicalOfEntry };
}

// =============================================================================
// HELPERS
// =============================================================================

function membersOf(cluster: DuplicateCluster, entries: readonly DeclarationEntry[]): DeclarationEntry[] {
  return cluster.members.map((index) => entryAt(entries, index));
}

function entryAt(entries: readonly DeclarationEntry[], index: number): DeclarationEntry {
  const entry = entries[index];
  if (!entry) {
    throw new Error(`Declaration entry ${index} is not in the arena.`);
  }
  return entry;
}

export function originOf(entry: DeclarationEntry): DeclarationOrigin {
  return {
    repositoryId: entry.repository.id,
    unitPath: entry.unit.path,
    name: entry.declaration.name,
  };
}

function describeEntry(entry: DeclarationEntry): string {
  return `${entry.repository.id}:${entry.unit.path}#${entry.declaration.name}`;
}

function roundConfidence(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export type { EntryComparator };
