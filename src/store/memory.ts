import type { IVectorStore } from "./interfaces.js";
import { requireEmbedding } from "./interfaces.js";
import type { ScoredChunk, TextChunk, Vector } from "../types.js";
import { cosineSimilarity, rankByScore } from "../routing/similarity.js";

/**
 * Vector store held entirely in memory. Used by tests and by hosts that load
 * a small corpus at startup.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly chunks = new Map<string, TextChunk & { embedding: Vector }>();
  private readonly profiles = new Map<string, Vector>();

  async initialize(): Promise<void> {}

  async close(): Promise<void> {
    this.chunks.clear();
    this.profiles.clear();
  }

  async search(vector: Vector, authorFilter: string | null, k: number): Promise<ScoredChunk[]> {
    const scored: ScoredChunk[] = [];
    for (const chunk of this.chunks.values()) {
      if (authorFilter !== null && chunk.authorId !== authorFilter) continue;
      scored.push({ chunk, score: cosineSimilarity(vector, chunk.embedding) });
    }
    return rankByScore(scored, (s) => s.score).slice(0, Math.max(0, k));
  }

  async getAllProfiles(): Promise<Map<string, Vector>> {
    return new Map(this.profiles);
  }

  async upsertChunks(chunks: readonly TextChunk[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, { ...chunk, embedding: requireEmbedding(chunk) });
    }
  }

  async upsertProfile(authorId: string, vector: Vector): Promise<void> {
    this.profiles.set(authorId, [...vector]);
  }
}
