/**
 * DebatePanel: library entry point.
 *
 *   ask()          Router -> RagResponder -> aggregate  (single round, cached)
 *   debate()       Router -> RagResponder -> DebateOrchestrator | AgenticDebateOrchestrator
 *   rankAuthors()  every author scored against a text
 *   streamAuthor() one author's grounded answer, token by token
 *
 * Validation errors are raised before any remote call. "No authors" and
 * "no responses" are raised as NoRelevantAuthorsError / GenerationFailedError.
 */

import { resolve } from "node:path";
import type { IEmbeddingService, IGenerationService } from "./adapters/base.js";
import type { IVectorStore } from "./store/interfaces.js";
import type { Author, AuthorSelectionResult, DebateSession, Query } from "./types.js";
import type { Config } from "./config.js";
import { getUserDataDir } from "./config.js";
import type { AuthorRegistry } from "./authors.js";
import { loadAuthors, resolveAuthors } from "./authors.js";
import type { QueryInput } from "./query.js";
import { createQuery } from "./query.js";
import { SemanticRouter } from "./routing/semantic-router.js";
import type { AuthorRanking } from "./routing/semantic-router.js";
import { RagResponder } from "./rag/responder.js";
import { aggregate } from "./aggregator.js";
import { DebateOrchestrator } from "./orchestrator.js";
import { AgenticDebateOrchestrator } from "./agentic-orchestrator.js";
import { ResponseCache } from "./cache/response-cache.js";
import { createGenerationService, createEmbeddingService } from "./adapters/index.js";
import { SqliteVectorStore } from "./store/sqlite.js";
import { withTimeout } from "./concurrency.js";
import {
  GenerationFailedError, NoRelevantAuthorsError, RetrievalError, ValidationError, errorMessage,
} from "./errors.js";
import { createLogger, initFileLogging } from "./logger.js";

const log = createLogger("panel");

export interface PanelDeps {
  config: Config;
  generator: IGenerationService;
  embedder: IEmbeddingService;
  store: IVectorStore;
  /** Defaults to loadAuthors(config). */
  registry?: AuthorRegistry;
}

export interface DebateOptions {
  /** Total rounds, 1..config.debate.maxRounds. Defaults to config.debate.defaultRounds. */
  rounds?: number;
  agentic?: boolean;
  /** Agentic only. Defaults to true. */
  useTools?: boolean;
}

export interface CreatePanelOptions {
  /** Write info.log and per-session logs under the user data directory. */
  fileLogging?: boolean;
}

/** Cache partition: explicit author list plus the selection bounds. */
function cacheScope(query: Query): string {
  const authors = query.explicitAuthors ? [...query.explicitAuthors].sort().join(",") : "*";
  return `${authors}|${query.minAuthors}-${query.maxAuthors}|${query.relevanceThreshold}`;
}

export class DebatePanel {
  readonly router: SemanticRouter;
  readonly responder: RagResponder;
  readonly registry: AuthorRegistry;
  private readonly orchestrator: DebateOrchestrator;
  private readonly agentic: AgenticDebateOrchestrator;
  private readonly cache: ResponseCache<DebateSession> | null;
  private readonly config: Config;
  private readonly embedder: IEmbeddingService;
  private readonly store: IVectorStore;

  constructor(deps: PanelDeps) {
    const { config, generator, embedder, store } = deps;
    this.config = config;
    this.embedder = embedder;
    this.store = store;
    this.registry = deps.registry ?? loadAuthors(config);

    this.router = new SemanticRouter(embedder, store, config.router, config.timeouts);
    this.responder = new RagResponder(generator, store, config.rag, config.timeouts);
    this.orchestrator = new DebateOrchestrator(
      generator,
      this.responder,
      { ...config.rag, roundOverrides: config.debate.roundOverrides },
      config.timeouts
    );
    this.agentic = new AgenticDebateOrchestrator({
      generator,
      embedder,
      store,
      responder: this.responder,
      settings: {
        maxResponseTokens: config.debate.agentic.maxResponseTokens,
        analysisMaxTokens: config.debate.agentic.analysisMaxTokens,
        temperature: config.rag.temperature,
      },
      timeouts: config.timeouts,
    });
    this.cache = config.cache.enabled ? new ResponseCache<DebateSession>(config.cache) : null;
    log.info("panel ready:", this.registry.size, "authors,", `generation=${generator.name},`, `embedding=${embedder.name}`);
  }

  /**
   * Build a panel from config: HTTP adapters for generation and embedding,
   * SQLite vector store at config.vectorStore.path.
   */
  static async create(config: Config, options: CreatePanelOptions = {}): Promise<DebatePanel> {
    if (options.fileLogging) {
      initFileLogging(getUserDataDir(config), config.logging);
    }
    const store = new SqliteVectorStore(resolve(config.vectorStore.path));
    await store.initialize();
    return new DebatePanel({
      config,
      generator: createGenerationService(config.generation, config.retry),
      embedder: createEmbeddingService(config.embedding, config.retry, config.timeouts.embeddingMs),
      store,
    });
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  /** Single-round answer from every selected author. */
  async ask(input: QueryInput): Promise<DebateSession> {
    const start = Date.now();
    const query = this.prepare(input);
    const selection = await this.select(query);

    const scope = cacheScope(query);
    const cached = this.cache?.get(query.text, selection.queryVector, scope);
    if (cached) return cached;

    const authors = this.authorsFor(selection);
    const responses = await this.responder.respondMany(query, authors, selection.queryVector);
    if (responses.length === 0) {
      throw new GenerationFailedError();
    }

    const session = aggregate(query, responses, Date.now() - start, selection.method);
    this.cache?.set(query.text, selection.queryVector, session, scope);
    return session;
  }

  async debate(input: QueryInput, options: DebateOptions = {}): Promise<DebateSession> {
    const rounds = options.rounds ?? this.config.debate.defaultRounds;
    const maxRounds = this.config.debate.maxRounds;
    if (!Number.isInteger(rounds) || rounds < 1 || rounds > maxRounds) {
      throw new ValidationError(`rounds must be an integer between 1 and ${maxRounds}, got ${rounds}`);
    }

    const query = this.prepare(input);
    const selection = await this.select(query);
    const authors = this.authorsFor(selection);
    if (authors.length < 2) {
      throw new NoRelevantAuthorsError(`Debate requires at least 2 authors, found ${authors.length}`);
    }

    const base = {
      query,
      authors,
      queryVector: selection.queryVector,
      selectionMethod: selection.method,
      rounds,
    };
    if (options.agentic) {
      return this.agentic.run({ ...base, useTools: options.useTools ?? true });
    }
    return this.orchestrator.run(base);
  }

  async rankAuthors(text: string): Promise<AuthorRanking[]> {
    if (!text.trim()) {
      throw new ValidationError("Query text cannot be empty");
    }
    return this.router.getAuthorRankings(text.trim());
  }

  /** Stream one registered author's grounded answer. Routing is skipped. */
  async *streamAuthor(input: QueryInput, authorId: string): AsyncGenerator<string> {
    const author = this.registry.get(authorId);
    if (!author) {
      throw new ValidationError(`Unknown author: ${authorId}`);
    }
    const query = this.prepare(input);
    let queryVector: number[];
    try {
      queryVector = await withTimeout((signal) => this.embedder.embed(query.text, signal), this.config.timeouts.embeddingMs, "query embedding");
    } catch (err) {
      throw new RetrievalError(`Failed to embed query: ${errorMessage(err)}`, err);
    }
    yield* this.responder.respondStreaming(query, author, queryVector);
  }

  /** Validate input and reject explicit ids missing from the registry. */
  private prepare(input: QueryInput): Query {
    const query = createQuery(input, { ...this.config.router, relevanceThreshold: this.router.relevanceThreshold });
    if (query.explicitAuthors) {
      const { missing } = resolveAuthors(query.explicitAuthors, this.registry);
      if (missing.length > 0) {
        throw new ValidationError(`Unknown author id(s): ${missing.join(", ")}`);
      }
    }
    return query;
  }

  private async select(query: Query): Promise<AuthorSelectionResult> {
    const selection = await this.router.selectAuthors(query);
    if (selection.selectedAuthors.length === 0) {
      throw new NoRelevantAuthorsError();
    }
    log.info(`selected [${selection.selectedAuthors.join(", ")}] (${selection.method})`);
    return selection;
  }

  private authorsFor(selection: AuthorSelectionResult): Author[] {
    const { authors, missing } = resolveAuthors(selection.selectedAuthors, this.registry);
    if (missing.length > 0) {
      log.warn(`profiles without a configured author, skipped: ${missing.join(", ")}`);
    }
    if (authors.length === 0) {
      throw new NoRelevantAuthorsError();
    }
    return authors;
  }
}
