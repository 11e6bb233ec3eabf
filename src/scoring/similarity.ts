import type { Vector } from "../types";

/**
 * Cosine similarity between two vectors, in [-1, 1].
 *
 * Degenerate input (empty vectors, mismatched dimensionality, a zero norm or
 * a non-finite result) yields 0 rather than an error.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  const s = dot / (Math.sqrt(na) * Math.sqrt(nb));
  return Number.isFinite(s) ? s : 0;
}
