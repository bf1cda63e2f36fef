// Declaration priority ordering.
// Purpose: the single tie-break policy shared by overlap resolution and namespace reconciliation.

import { compareDescending, compareText } from "../../core/utils.js";
import type { LicensePolicy } from "../../license/policy.js";
import type { DeclarationEntry } from "../model/schema.js";

export type EntryComparator = (a: DeclarationEntry, b: DeclarationEntry) => number;

// Negative when `a` is preferred. Rules apply in order; the tail keeps the order total.
export function createPriorityComparator(policy: LicensePolicy): EntryComparator {
  return (a, b) =>
    compareDescending(a.repository.trustRank, b.repository.trustRank) ||
    compareDescending(
      policy.permissiveness(a.repository.license.id),
      policy.permissiveness(b.repository.license.id),
    ) ||
    compareDescending(a.declaration.text.length, b.declaration.text.length) ||
    compareText(a.repository.id, b.repository.id) ||
    compareText(a.unit.path, b.unit.path) ||
    a.declaration.start - b.declaration.start ||
    compareText(a.declaration.name, b.declaration.name);
}

export function pickPreferred(
  entries: readonly DeclarationEntry[],
  compare: EntryComparator,
): DeclarationEntry {
  const [first, ...rest] = entries;
  if (!first) {
    throw new Error("Cannot rank an empty set of declarations.");
  }
  return rest.reduce((best, entry) => (compare(entry, best) < 0 ? entry : best), first);
}
