/**
 * Vector store interface.
 *
 * Holds two things: per-author text chunks with their content embeddings,
 * and one expertise vector ("profile") per author used by the router.
 * Scores returned by search are similarities in [0,1], higher = closer.
 */

import type { ScoredChunk, TextChunk, Vector } from "../types.js";
import { ValidationError } from "../errors.js";

export interface IVectorStore {
  /**
   * Top-k chunks nearest to `vector`, best first.
   * `authorFilter` restricts the search to one author's corpus; null searches everything.
   */
  search(vector: Vector, authorFilter: string | null, k: number): Promise<ScoredChunk[]>;

  /** Every author's expertise vector, keyed by author id. */
  getAllProfiles(): Promise<Map<string, Vector>>;

  /** Insert or replace chunks by id. Every chunk must carry an embedding. */
  upsertChunks(chunks: readonly TextChunk[]): Promise<void>;

  upsertProfile(authorId: string, vector: Vector): Promise<void>;

  // --- Lifecycle ---
  initialize(): Promise<void>;
  close(): Promise<void>;
}

/** The chunk's embedding, or a ValidationError naming the chunk. */
export function requireEmbedding(chunk: TextChunk): Vector {
  if (!chunk.embedding || chunk.embedding.length === 0) {
    throw new ValidationError(`chunk "${chunk.id}" has no embedding`);
  }
  return chunk.embedding;
}
