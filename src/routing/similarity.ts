import type { Vector } from "../types.js";
import { RetrievalError } from "../errors.js";

/**
 * Cosine similarity clamped to [0,1].
 * Zero-norm vectors score 0 rather than dividing by zero. Vectors of different
 * lengths come from different embedding models and throw RetrievalError.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new RetrievalError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, cos));
}

/**
 * Copy of `items` ordered by score descending. Array.prototype.sort is
 * stable, so equal scores keep input order.
 */
export function rankByScore<T>(items: readonly T[], score: (item: T) => number): T[] {
  return [...items].sort((a, b) => score(b) - score(a));
}
