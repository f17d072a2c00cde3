/**
 * Smyklot - src/lib/editDistance.ts
 * WHAT: Levenshtein distance and nearest-name lookup for "did you mean" hints.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Classic two-row dynamic programming. Inputs are command names, so
 * O(n·m) is nothing to worry about.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

export type Suggestion = { name: string; distance: number };

/**
 * Nearest candidate within maxDistance. Ties go to the candidate listed
 * first, which keeps suggestions stable across runs.
 */
export function nearest(
  input: string,
  candidates: Iterable<string>,
  maxDistance: number
): Suggestion | null {
  let best: Suggestion | null = null;
  for (const name of candidates) {
    const distance = levenshtein(input, name);
    if (distance > maxDistance) continue;
    if (!best || distance < best.distance) {
      best = { name, distance };
    }
  }
  return best;
}
