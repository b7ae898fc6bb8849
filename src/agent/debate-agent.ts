/**
 * DebateAgent: one author's tool-using participant in an agentic debate.
 *
 * Tools:
 *   search_own_works       top-k passages from the author's own corpus
 *   search_other_works     top-k passages from another author's corpus
 *   recall_previous_round  records of an earlier round from the knowledge base
 *   analyze_argument       short critique of another author's answer (one generation call)
 *
 * A rebuttal turn with tools on runs a fixed protocol: search own works for
 * the query, analyse up to two opposing answers, search own works again with
 * the opening words of the first one, then generate once from the passages,
 * the reasoning chain and the other answers. Every tool call and the final
 * answer are recorded in the shared knowledge base under the current round.
 */

import type { IEmbeddingService, IGenerationService } from "../adapters/base.js";
import type { IVectorStore } from "../store/interfaces.js";
import type { IDebateKnowledgeBase, KnowledgeRecord } from "../memory/base.js";
import type { Author, AuthorResponse, ChunkRef, Query, ScoredChunk, ToolName, Vector } from "../types.js";
import { toChunkRef } from "../types.js";
import type { TimeoutConfig } from "../config.js";
import type { SessionLog } from "../logger.js";
import { buildAgenticPrompt, buildAnalysisPrompt } from "../rag/prompts.js";
import { withTimeout } from "../concurrency.js";
import { createLogger } from "../logger.js";

const log = createLogger("agent");

/** Opposing answers analysed per turn. */
const MAX_ANALYSES = 2;
/** Words of the first opposing answer used for the rebuttal search. */
const KEY_TERMS = 20;

export interface AgentSettings {
  maxResponseTokens: number;
  analysisMaxTokens: number;
  temperature: number;
}

export interface DebateAgentOptions {
  author: Author;
  generator: IGenerationService;
  embedder: IEmbeddingService;
  store: IVectorStore;
  knowledgeBase: IDebateKnowledgeBase;
  settings: AgentSettings;
  timeouts: TimeoutConfig;
  sessionLog?: SessionLog | null;
}

export interface TurnOptions {
  query: Query;
  roundNumber: number;
  /** Previous-round answers of the other authors. */
  others: readonly AuthorResponse[];
  useTools: boolean;
}

export class DebateAgent {
  readonly author: Author;
  private readonly generator: IGenerationService;
  private readonly embedder: IEmbeddingService;
  private readonly store: IVectorStore;
  private readonly knowledgeBase: IDebateKnowledgeBase;
  private readonly settings: AgentSettings;
  private readonly timeouts: TimeoutConfig;
  private readonly slog: SessionLog | null;

  private currentRound = 1;
  private toolUses = 0;
  private reasoningChain: string[] = [];

  constructor(options: DebateAgentOptions) {
    this.author = options.author;
    this.generator = options.generator;
    this.embedder = options.embedder;
    this.store = options.store;
    this.knowledgeBase = options.knowledgeBase;
    this.settings = options.settings;
    this.timeouts = options.timeouts;
    this.slog = options.sessionLog ?? null;
  }

  /** Tool calls made during the current (or last) turn. */
  get toolUseCount(): number {
    return this.toolUses;
  }

  get reasoning(): readonly string[] {
    return this.reasoningChain;
  }

  // ── Tools ─────────────────────────────────────────────────────────────

  async searchOwnWorks(text: string, topK = 5): Promise<ScoredChunk[]> {
    const results = await this.search(this.author.id, text, topK);
    await this.recordTool("search_own_works");
    log.info(`${this.author.displayName} searched own works -> ${results.length} results`);
    return results;
  }

  async searchOtherWorks(authorId: string, text: string, topK = 3): Promise<ScoredChunk[]> {
    const results = await this.search(authorId, text, topK);
    await this.recordTool("search_other_works");
    log.info(`${this.author.displayName} searched ${authorId}'s works -> ${results.length} results`);
    return results;
  }

  /** Records of round `n`, or undefined when that round has nothing recorded. */
  async recallPreviousRound(n: number): Promise<readonly KnowledgeRecord[] | undefined> {
    const records = await this.knowledgeBase.getRound(n);
    if (records) {
      await this.recordTool("recall_previous_round");
      log.info(`${this.author.displayName} recalled round ${n}`);
    }
    return records;
  }

  async analyzeArgument(argumentText: string, authorName: string): Promise<string> {
    const start = Date.now();
    const analysis = await withTimeout(
      (signal) => this.generator.generate({
        systemPrompt: this.author.systemPrompt,
        userPrompt: buildAnalysisPrompt(argumentText, authorName),
        maxTokens: this.settings.analysisMaxTokens,
        temperature: this.settings.temperature,
        timeoutMs: this.timeouts.generationMs,
        signal,
      }),
      this.timeouts.generationMs,
      `analysis (${this.author.id})`
    );
    await this.recordTool("analyze_argument");
    this.reasoningChain.push(`Analyzed ${authorName}'s argument: ${analysis}`);
    log.info(`${this.author.displayName} analyzed ${authorName}'s argument (${Date.now() - start}ms)`);
    return analysis;
  }

  // ── Turn ──────────────────────────────────────────────────────────────

  async takeTurn(options: TurnOptions): Promise<AuthorResponse> {
    const { query, roundNumber, others, useTools } = options;
    const start = Date.now();
    this.currentRound = roundNumber;
    this.toolUses = 0;
    this.reasoningChain = [];

    let passages: ScoredChunk[];
    if (useTools && roundNumber > 1) {
      this.reasoningChain.push(`Searching my works for insights on: ${query.text}`);
      passages = await this.searchOwnWorks(query.text, 5);

      for (const other of others.slice(0, MAX_ANALYSES)) {
        this.reasoningChain.push(`Analyzing ${other.authorName}'s argument`);
        await this.analyzeArgument(other.responseText, other.authorName);
      }

      const keyTerms = others.length > 0
        ? others[0].responseText.split(/\s+/).filter(Boolean).slice(0, KEY_TERMS).join(" ")
        : "";
      // An empty answer gives nothing to embed
      if (keyTerms) {
        this.reasoningChain.push("Searching for additional context on their key points");
        passages = passages.concat(await this.searchOwnWorks(keyTerms, 3));
      }
    } else {
      passages = await this.searchOwnWorks(query.text, 5);
    }

    const userPrompt = buildAgenticPrompt({
      queryText: query.text,
      roundNumber,
      others,
      reasoningChain: this.reasoningChain,
      passages,
    });
    this.slog?.write("debug", `--- ${this.author.id} agentic prompt (round ${roundNumber}) ---\n${userPrompt}`);

    const responseText = await withTimeout(
      (signal) => this.generator.generate({
        systemPrompt: this.author.systemPrompt,
        userPrompt,
        maxTokens: this.settings.maxResponseTokens,
        temperature: this.settings.temperature,
        timeoutMs: this.timeouts.generationMs,
        signal,
      }),
      this.timeouts.generationMs,
      `generation (${this.author.id})`
    );

    await this.knowledgeBase.recordResponse(
      roundNumber,
      this.author.id,
      this.author.displayName,
      responseText,
      this.toolUses,
      this.reasoningChain.length
    );

    const generationTimeMs = Date.now() - start;
    log.info(`agentic response for ${this.author.displayName} (round ${roundNumber},`,
      `${this.toolUses} tool uses, ${this.reasoningChain.length} reasoning steps, ${generationTimeMs}ms)`);

    return Object.freeze({
      authorId: this.author.id,
      authorName: this.author.displayName,
      responseText,
      relevanceScore: 1.0,
      retrievedChunks: uniqueRefs(passages),
      generationTimeMs,
    });
  }

  private async search(authorId: string, text: string, topK: number): Promise<ScoredChunk[]> {
    const vector: Vector = await withTimeout((signal) => this.embedder.embed(text, signal), this.timeouts.embeddingMs, "tool embedding");
    return withTimeout(() => this.store.search(vector, authorId, topK), this.timeouts.searchMs, `search (${authorId})`);
  }

  private async recordTool(tool: ToolName): Promise<void> {
    this.toolUses++;
    await this.knowledgeBase.recordToolUse(this.currentRound, this.author.id, tool);
  }
}

/** Chunk refs in first-seen order, one per chunk id. */
function uniqueRefs(passages: readonly ScoredChunk[]): ChunkRef[] {
  const seen = new Set<string>();
  const refs: ChunkRef[] = [];
  for (const { chunk } of passages) {
    if (seen.has(chunk.id)) continue;
    seen.add(chunk.id);
    refs.push(toChunkRef(chunk));
  }
  return refs;
}
