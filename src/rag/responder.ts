/**
 * RAG responder: one grounded answer per author.
 *
 * Retrieve the author's top-K chunks, wrap them in the excerpt prompt and
 * generate once under the author's system prompt. respondMany fans out one
 * task per author; a failed author is logged and left out.
 */

import type { IGenerationService } from "../adapters/base.js";
import type { IVectorStore } from "../store/interfaces.js";
import type { Author, AuthorResponse, Query, ScoredChunk, Vector } from "../types.js";
import { toChunkRef } from "../types.js";
import type { Config, TimeoutConfig } from "../config.js";
import { buildContext, buildRagPrompt } from "./prompts.js";
import { settleAll, successes, withTimeout } from "../concurrency.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("rag");

export type RagSettings = Config["rag"];

export class RagResponder {
  constructor(
    private readonly generator: IGenerationService,
    private readonly store: IVectorStore,
    private readonly settings: RagSettings,
    private readonly timeouts: Pick<TimeoutConfig, "searchMs" | "generationMs">
  ) {
    log.info(`top_k=${settings.topKChunks}, max_tokens=${settings.maxResponseTokens}`);
  }

  /** Top-k chunks of one author's corpus nearest to `vector`. */
  retrieve(authorId: string, vector: Vector, k = this.settings.topKChunks): Promise<ScoredChunk[]> {
    return withTimeout(() => this.store.search(vector, authorId, k), this.timeouts.searchMs, `search (${authorId})`);
  }

  async respond(query: Query, author: Author, queryVector: Vector): Promise<AuthorResponse> {
    const start = Date.now();
    const chunks = await this.retrieve(author.id, queryVector);
    log.debug(`retrieved ${chunks.length} chunks for ${author.displayName}`);

    const userPrompt = buildRagPrompt(query.text, buildContext(chunks));
    const responseText = await withTimeout(
      (signal) => this.generator.generate({
        systemPrompt: author.systemPrompt,
        userPrompt,
        maxTokens: this.settings.maxResponseTokens,
        temperature: this.settings.temperature,
        timeoutMs: this.timeouts.generationMs,
        signal,
      }),
      this.timeouts.generationMs,
      `generation (${author.id})`
    );

    const relevanceScore = chunks.length > 0
      ? chunks.reduce((sum, c) => sum + c.score, 0) / chunks.length
      : 0;
    const generationTimeMs = Date.now() - start;

    log.info(`response for ${author.displayName}`,
      `(relevance=${relevanceScore.toFixed(2)}, time=${generationTimeMs}ms)`);

    return Object.freeze({
      authorId: author.id,
      authorName: author.displayName,
      responseText,
      relevanceScore,
      retrievedChunks: chunks.map((c) => toChunkRef(c.chunk)),
      generationTimeMs,
    });
  }

  /** One concurrent task per author; failures are logged and omitted. */
  async respondMany(query: Query, authors: readonly Author[], queryVector: Vector): Promise<AuthorResponse[]> {
    const start = Date.now();
    const results = await settleAll(
      authors.map((author) => ({
        label: author.displayName,
        run: () => this.respond(query, author, queryVector),
      }))
    );

    for (const r of results) {
      if (!r.ok) log.error(`failed to generate response for ${r.label}:`, errorMessage(r.error));
    }

    const responses = successes(results);
    log.info(`generated ${responses.length}/${authors.length} responses (${Date.now() - start}ms)`);
    return responses;
  }

  /** Same retrieval and prompt as respond(), yielding tokens as they arrive. */
  async *respondStreaming(query: Query, author: Author, queryVector: Vector): AsyncGenerator<string> {
    const chunks = await this.retrieve(author.id, queryVector);
    yield* this.generator.generateStreaming({
      systemPrompt: author.systemPrompt,
      userPrompt: buildRagPrompt(query.text, buildContext(chunks)),
      maxTokens: this.settings.maxResponseTokens,
      temperature: this.settings.temperature,
      timeoutMs: this.timeouts.generationMs,
    });
  }
}
