// Similarity index.
// Purpose: exact and near-duplicate lookup over fingerprinted declarations.
// Assumes a single writer: every declaration is added before seal(), and nothing is queried before it.

import { compareText } from "../../core/utils.js";

import type { DeclarationKind, DuplicateCluster, DuplicateGroup } from "../model/schema.js";

import { tokenEditDistance } from "./fingerprint.js";

// =============================================================================
// TYPES
// =============================================================================

export type IndexedDeclaration = {
  index: number;
  fingerprint: string;
  kind: DeclarationKind;
  normalized: readonly string[];
};

export type NearMatch = {
  fingerprint: string;
  members: number[];
  distance: number;
  confidence: number;
};

export type IndexQueryResult = {
  exact: number[];
  near: NearMatch[];
};

type FingerprintRecord = {
  fingerprint: string;
  kind: DeclarationKind;
  normalized: readonly string[];
  members: number[];
};

const BUCKET_PREFIX_LENGTH = 4;

// =============================================================================
// INDEX
// =============================================================================

export class SimilarityIndex {
  private readonly buckets = new Map<string, Map<string, FingerprintRecord>>();
  private byLength: FingerprintRecord[] = [];
  private sealed = false;
  private size = 0;

  add(entry: IndexedDeclaration): void {
    if (this.sealed) {
      throw new Error("Similarity index is sealed; declarations can no longer be added.");
    }

    const prefix = entry.fingerprint.slice(0, BUCKET_PREFIX_LENGTH);
    let bucket = this.buckets.get(prefix);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(prefix, bucket);
    }

    const record = bucket.get(entry.fingerprint);
    if (record) {
      record.members.push(entry.index);
    } else {
      bucket.set(entry.fingerprint, {
        fingerprint: entry.fingerprint,
        kind: entry.kind,
        normalized: entry.normalized,
        members: [entry.index],
      });
    }
    this.size += 1;
  }

  seal(): void {
    if (this.sealed) return;
    const records: FingerprintRecord[] = [];
    for (const bucket of this.buckets.values()) {
      for (const record of bucket.values()) {
        record.members.sort((a, b) => a - b);
        records.push(record);
      }
    }
    this.byLength = records.sort(
      (a, b) => a.normalized.length - b.normalized.length || compareText(a.fingerprint, b.fingerprint),
    );
    this.sealed = true;
  }

  get declarationCount(): number {
    return this.size;
  }

  get fingerprintCount(): number {
    return this.byLength.length;
  }

  fingerprints(): string[] {
    this.assertSealed();
    return this.byLength.map((record) => record.fingerprint).sort(compareText);
  }

  exact(digest: string): number[] {
    this.assertSealed();
    return [...(this.lookup(digest)?.members ?? [])];
  }

  query(digest: string, nearThreshold: number): IndexQueryResult {
    this.assertSealed();
    const record = this.lookup(digest);
    if (!record) return { exact: [], near: [] };

    return {
      exact: [...record.members],
      near: nearThreshold > 0 ? this.nearMatches(record, nearThreshold) : [],
    };
  }

  // ---------------------------------------------------------------------------

  private lookup(digest: string): FingerprintRecord | undefined {
    return this.buckets.get(digest.slice(0, BUCKET_PREFIX_LENGTH))?.get(digest);
  }

  private assertSealed(): void {
    if (!this.sealed) {
      throw new Error("Similarity index queried before every declaration was indexed.");
    }
  }

  // Normalized distance d/max(n, m) <= t needs |n - m| <= t * max(n, m), which bounds candidate lengths.
  private nearMatches(seed: FingerprintRecord, threshold: number): NearMatch[] {
    const n = seed.normalized.length;
    const minLength = Math.ceil(n * (1 - threshold) - 1e-9);
    const maxLength = threshold >= 1 ? Number.POSITIVE_INFINITY : Math.floor(n / (1 - threshold) + 1e-9);

    const matches: NearMatch[] = [];
    for (let i = lowerBound(this.byLength, minLength); i < this.byLength.length; i += 1) {
      const candidate = this.byLength[i];
      if (!candidate) break;
      const m = candidate.normalized.length;
      if (m > maxLength) break;
      if (candidate.fingerprint === seed.fingerprint || candidate.kind !== seed.kind) continue;

      const longest = Math.max(n, m);
      const maxDistance = Math.floor(threshold * longest + 1e-9);
      const distance = tokenEditDistance(seed.normalized, candidate.normalized, maxDistance);
      if (distance > maxDistance) continue;

      matches.push({
        fingerprint: candidate.fingerprint,
        members: [...candidate.members],
        distance,
        confidence: longest === 0 ? 1 : 1 - distance / longest,
      });
    }

    return matches.sort(
      (a, b) => b.confidence - a.confidence || compareText(a.fingerprint, b.fingerprint),
    );
  }
}

// =============================================================================
// GROUPING
// =============================================================================

// Seeds are visited in fingerprint order, so grouping never depends on insertion order.
export function buildDuplicateGroups(index: SimilarityIndex, nearThreshold: number): DuplicateGroup[] {
  const assigned = new Set<string>();
  const groups: DuplicateGroup[] = [];

  for (const digest of index.fingerprints()) {
    if (assigned.has(digest)) continue;
    assigned.add(digest);

    const result = index.query(digest, nearThreshold);
    const clusters: DuplicateCluster[] = [
      { fingerprint: digest, members: result.exact, match: "exact", confidence: 1 },
    ];

    for (const near of result.near) {
      if (assigned.has(near.fingerprint)) continue;
      assigned.add(near.fingerprint);
      clusters.push({
        fingerprint: near.fingerprint,
        members: near.members,
        match: "near",
        confidence: near.confidence,
      });
    }

    groups.push({ id: groups.length, clusters });
  }

  return groups;
}

// =============================================================================
// HELPERS
// =============================================================================

function lowerBound(records: FingerprintRecord[], length: number): number {
  let low = 0;
  let high = records.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    const record = records[mid];
    if (record && record.normalized.length < length) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}
