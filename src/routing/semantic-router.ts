/**
 * Semantic router: decides which authors answer a query.
 *
 * The query is embedded once and compared (cosine) against every author's
 * expertise vector. Authors at or above the threshold are candidates; the
 * selection method records which of the three outcomes applied:
 *
 *   threshold          enough candidates; keep the top maxAuthors
 *   fallback_top_k     too few, fallback on; top max(minAuthors, |candidates|) by raw score
 *   threshold_partial  too few, fallback off; return the candidates as they are
 *
 * Explicit author lists bypass filtering ("specified") and are only scored
 * for bookkeeping.
 */

import type { IEmbeddingService } from "../adapters/base.js";
import type { IVectorStore } from "../store/interfaces.js";
import type { AuthorSelectionResult, Query, SelectionMethod, Vector } from "../types.js";
import type { Config, TimeoutConfig } from "../config.js";
import { cosineSimilarity, rankByScore } from "./similarity.js";
import { withTimeout } from "../concurrency.js";
import { RetrievalError, ValidationError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("router");

export type RouterSettings = Config["router"];

export interface AuthorRanking {
  authorId: string;
  score: number;
}

export class SemanticRouter {
  private profiles: Map<string, Vector> | null = null;
  private threshold: number;
  private readonly fallbackToTop: boolean;

  constructor(
    private readonly embedder: IEmbeddingService,
    private readonly store: IVectorStore,
    settings: RouterSettings,
    private readonly timeouts: Pick<TimeoutConfig, "embeddingMs" | "searchMs">
  ) {
    this.threshold = settings.relevanceThreshold;
    this.fallbackToTop = settings.fallbackToTopAuthors;
    log.info(`threshold=${settings.relevanceThreshold}, min=${settings.minAuthors},`,
      `max=${settings.maxAuthors}, fallback=${settings.fallbackToTopAuthors}`);
  }

  /** Default threshold for queries that do not set their own. */
  get relevanceThreshold(): number {
    return this.threshold;
  }

  updateThreshold(value: number): void {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ValidationError(`relevance threshold must be between 0 and 1, got ${value}`);
    }
    log.info("threshold updated:", this.threshold, "->", value);
    this.threshold = value;
  }

  /** Drop cached profiles; the next selection reloads them from the store. */
  clearCache(): void {
    this.profiles = null;
    log.info("profile cache cleared");
  }

  async selectAuthors(query: Query): Promise<AuthorSelectionResult> {
    const queryVector = await this.embedQuery(query.text);
    const profiles = await this.loadProfiles();

    if (query.explicitAuthors && query.explicitAuthors.length > 0) {
      return this.specified(query, queryVector, profiles);
    }

    const scores: Record<string, number> = {};
    const scored: AuthorRanking[] = [];
    for (const [authorId, vector] of profiles) {
      const score = cosineSimilarity(queryVector, vector);
      scores[authorId] = score;
      scored.push({ authorId, score });
    }

    const threshold = query.relevanceThreshold;
    const ranked = rankByScore(scored, (r) => r.score);
    const candidates = ranked.filter((r) => r.score >= threshold);

    let selected: AuthorRanking[];
    let method: SelectionMethod;
    if (candidates.length >= query.minAuthors) {
      selected = candidates.slice(0, query.maxAuthors);
      method = "threshold";
      log.info(`selected ${selected.length} authors by threshold (${threshold.toFixed(2)})`);
    } else if (this.fallbackToTop) {
      selected = ranked.slice(0, Math.max(query.minAuthors, candidates.length));
      method = "fallback_top_k";
      log.warn(`only ${candidates.length} authors above threshold, falling back to top-${selected.length}`);
    } else {
      selected = candidates;
      method = "threshold_partial";
      log.warn(`only ${candidates.length} authors above threshold (min=${query.minAuthors})`);
    }

    return {
      selectedAuthors: selected.map((r) => r.authorId),
      similarityScores: scores,
      method,
      queryVector,
      thresholdUsed: threshold,
    };
  }

  /** Every author with a profile, scored against `text`, best first. */
  async getAuthorRankings(text: string): Promise<AuthorRanking[]> {
    const queryVector = await this.embedQuery(text);
    const profiles = await this.loadProfiles();
    const scored = [...profiles].map(([authorId, vector]) => ({
      authorId,
      score: cosineSimilarity(queryVector, vector),
    }));
    return rankByScore(scored, (r) => r.score);
  }

  private specified(query: Query, queryVector: Vector, profiles: Map<string, Vector>): AuthorSelectionResult {
    const scores: Record<string, number> = {};
    const selected: string[] = [];
    for (const authorId of query.explicitAuthors ?? []) {
      const vector = profiles.get(authorId);
      if (!vector) {
        log.warn(`specified author has no profile, dropped: ${authorId}`);
        continue;
      }
      scores[authorId] = cosineSimilarity(queryVector, vector);
      selected.push(authorId);
    }
    return {
      selectedAuthors: selected,
      similarityScores: scores,
      method: "specified",
      queryVector,
      thresholdUsed: query.relevanceThreshold,
    };
  }

  private async embedQuery(text: string): Promise<Vector> {
    try {
      const vector = await withTimeout((signal) => this.embedder.embed(text, signal), this.timeouts.embeddingMs, "query embedding");
      log.debug("query embedded:", vector.length, "dimensions");
      return vector;
    } catch (err) {
      throw new RetrievalError(`Failed to embed query: ${errorMessage(err)}`, err);
    }
  }

  private async loadProfiles(): Promise<Map<string, Vector>> {
    if (this.profiles) return this.profiles;
    let profiles: Map<string, Vector>;
    try {
      profiles = await withTimeout(() => this.store.getAllProfiles(), this.timeouts.searchMs, "profile load");
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError(`Failed to load author profiles: ${errorMessage(err)}`, err);
    }
    log.info("loaded", profiles.size, "author profiles");
    this.profiles = profiles;
    return profiles;
  }
}
