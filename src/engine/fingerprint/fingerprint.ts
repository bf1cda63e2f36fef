// Structural fingerprints.
// Purpose: digest declarations so formatting, comments and consistent renaming never change the result.
// Assumes tokens come from parse(); binding tokens are the only ones renamed.

import crypto from "node:crypto";

import type { Declaration, DeclarationToken } from "../model/schema.js";

export type FingerprintResult = {
  fingerprint: string;
  normalized: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalizeTokens(tokens: readonly DeclarationToken[]): string[] {
  const placeholders = new Map<string, string>();
  return tokens.map((token) => {
    if (!token.binding) return token.text;
    let placeholder = placeholders.get(token.text);
    if (!placeholder) {
      placeholder = `$${placeholders.size}`;
      placeholders.set(token.text, placeholder);
    }
    return placeholder;
  });
}

export function fingerprint(declaration: Pick<Declaration, "kind" | "tokens">): string {
  return fingerprintDeclaration(declaration).fingerprint;
}

export function fingerprintDeclaration(
  declaration: Pick<Declaration, "kind" | "tokens">,
): FingerprintResult {
  const normalized = normalizeTokens(declaration.tokens);
  const digest = crypto
    .createHash("sha256")
    .update(`${declaration.kind}\n${normalized.join("\u0000")}`)
    .digest("hex");
  return { fingerprint: digest, normalized };
}

// Levenshtein distance over token sequences, restricted to a diagonal band.
// Returns maxDistance + 1 as soon as the distance is known to exceed maxDistance.
export function tokenEditDistance(
  left: readonly string[],
  right: readonly string[],
  maxDistance: number = Number.POSITIVE_INFINITY,
): number {
  const n = left.length;
  const m = right.length;
  const limit = Number.isFinite(maxDistance) ? Math.max(0, Math.floor(maxDistance)) : Math.max(n, m);
  if (Math.abs(n - m) > limit) return limit + 1;
  if (n === 0 || m === 0) return Math.max(n, m);

  const outside = limit + 1;
  let previous = new Array<number>(m + 1);
  let current = new Array<number>(m + 1);
  for (let j = 0; j <= m; j += 1) previous[j] = j <= limit ? j : outside;

  for (let i = 1; i <= n; i += 1) {
    const from = Math.max(1, i - limit);
    const to = Math.min(m, i + limit);
    current.fill(outside);
    current[0] = i <= limit ? i : outside;
    let rowMin = current[0] ?? outside;

    for (let j = from; j <= to; j += 1) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      const value = Math.min(
        (previous[j] ?? outside) + 1,
        (current[j - 1] ?? outside) + 1,
        (previous[j - 1] ?? outside) + cost,
      );
      current[j] = Math.min(value, outside);
      rowMin = Math.min(rowMin, current[j] ?? outside);
    }

    if (rowMin > limit) return outside;
    [previous, current] = [current, previous];
  }

  return Math.min(previous[m] ?? outside, outside);
}
