// License policy table.
// Purpose: answer permissiveness and combination questions as data lookups; no license names are special-cased here.
// Assumes the table is injected from config (inline mapping or JSON file).

import path from "node:path";

import { z } from "zod";

import { ConfigError } from "../core/errors.js";
import { dataDir } from "../core/paths.js";
import { readJsonFile } from "../core/utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const LicensePolicyEntrySchema = z
  .object({
    permissiveness_rank: z.number().int(),
    combinable_with: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const LicensePolicyTableSchema = z.record(z.string().min(1), LicensePolicyEntrySchema);

export type LicensePolicyEntry = z.infer<typeof LicensePolicyEntrySchema>;
export type LicensePolicyTable = z.infer<typeof LicensePolicyTableSchema>;

export const UNKNOWN_LICENSE_RANK = Number.NEGATIVE_INFINITY;

// =============================================================================
// POLICY
// =============================================================================

export class LicensePolicy {
  private readonly entries: Map<string, LicensePolicyEntry>;

  constructor(table: LicensePolicyTable) {
    this.entries = new Map(Object.entries(table));
  }

  has(licenseId: string): boolean {
    return this.entries.has(licenseId);
  }

  permissiveness(licenseId: string): number {
    return this.entries.get(licenseId)?.permissiveness_rank ?? UNKNOWN_LICENSE_RANK;
  }

  // Same license always combines; otherwise either side may declare the pairing.
  canCombine(left: string, right: string): boolean {
    if (left === right) return true;
    const leftEntry = this.entries.get(left);
    const rightEntry = this.entries.get(right);
    return (
      (leftEntry?.combinable_with.includes(right) ?? false) ||
      (rightEntry?.combinable_with.includes(left) ?? false)
    );
  }

  incompatiblePairs(licenseIds: Iterable<string>): Array<[string, string]> {
    const unique = Array.from(new Set(licenseIds)).sort();
    const pairs: Array<[string, string]> = [];
    for (let i = 0; i < unique.length; i += 1) {
      for (let j = i + 1; j < unique.length; j += 1) {
        const left = unique[i];
        const right = unique[j];
        if (left !== undefined && right !== undefined && !this.canCombine(left, right)) {
          pairs.push([left, right]);
        }
      }
    }
    return pairs;
  }
}

// =============================================================================
// LOADING
// =============================================================================

export function parseLicensePolicy(raw: unknown, source: string): LicensePolicy {
  const parsed = LicensePolicyTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid license policy in ${source}: ${issues}`, parsed.error);
  }
  return new LicensePolicy(parsed.data);
}

export async function loadLicensePolicyFile(filePath: string): Promise<LicensePolicy> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw new ConfigError(`Failed to read license policy at ${filePath}.`, err);
  }
  return parseLicensePolicy(raw, filePath);
}

export function defaultLicensePolicyPath(): string {
  return path.join(dataDir(), "license-policy.json");
}
