import { normalizeName } from './normalize.js';

/** Edit distance with insert/delete/substitute all costing 1. */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1]
        : 1 + Math.min(previous[j], current[j - 1], previous[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length];
}

/**
 * Similarity in [0, 1] as `1 - distance / longerLength` over normalized names.
 * Blank names never match anything.
 */
export function nameSimilarity(nameA: string, nameB: string): number {
  return normalizedSimilarity(normalizeName(nameA), normalizeName(nameB));
}

/** Same as {@link nameSimilarity} for names that are already normalized. */
export function normalizedSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 1;
  return 1 - levenshtein(a, b) / Math.max(a.length, b.length);
}
