/**
 * DebateOrchestrator: runs a multi-round debate between selected authors.
 *
 * Round 1 is the grounded RAG answer of each author. Every later round shows
 * each author the other authors' previous-round answers (never their own) and
 * asks for a rebuttal. Authors within a round run concurrently; the next round
 * starts only once the current one has settled. A failed author is logged and
 * left out of that round; the debate carries on with whoever answered.
 */

import { randomUUID } from "node:crypto";
import type { IGenerationService } from "./adapters/base.js";
import type { RagResponder } from "./rag/responder.js";
import type {
  Author, AuthorResponse, DebateRound, DebateSession, Query, RoundType, SelectionMethod, Vector,
} from "./types.js";
import { roundTypeFor } from "./types.js";
import type { Config, TimeoutConfig } from "./config.js";
import { buildDebatePrompt } from "./rag/prompts.js";
import { settleAll, successes, withTimeout } from "./concurrency.js";
import { GenerationFailedError, errorMessage } from "./errors.js";
import { createLogger, createSessionLog } from "./logger.js";
import type { SessionLog } from "./logger.js";

const log = createLogger("orchestrator");

export interface DebateRunOptions {
  query: Query;
  authors: readonly Author[];
  queryVector: Vector;
  selectionMethod: SelectionMethod;
  /** Total rounds including round 1. Bounds are the caller's policy. */
  rounds: number;
  /** Round-1 answers already produced by the caller; generated here when omitted. */
  initialResponses?: readonly AuthorResponse[];
  sessionId?: string;
}

export interface GenerationSettings {
  maxResponseTokens: number;
  temperature: number;
  roundOverrides: Config["debate"]["roundOverrides"];
}

/** Max tokens and temperature for a round type, after per-type overrides. */
export function roundSettings(
  settings: GenerationSettings,
  roundType: RoundType
): { maxTokens: number; temperature: number } {
  const override = roundType === "initial" ? undefined : settings.roundOverrides[roundType];
  return {
    maxTokens: override?.maxTokens ?? settings.maxResponseTokens,
    temperature: override?.temperature ?? settings.temperature,
  };
}

/** Previous-round responses from everyone except `authorId`. */
export function othersFor(authorId: string, previous: readonly AuthorResponse[]): AuthorResponse[] {
  return previous.filter((r) => r.authorId !== authorId);
}

/** Round 1: caller-supplied answers, or a fresh respondMany. Empty is fatal. */
export async function initialRound(
  responder: RagResponder,
  options: Pick<DebateRunOptions, "query" | "authors" | "queryVector" | "initialResponses">
): Promise<DebateRound> {
  const responses = options.initialResponses
    ? [...options.initialResponses]
    : await responder.respondMany(options.query, options.authors, options.queryVector);
  if (responses.length === 0) {
    throw new GenerationFailedError();
  }
  return Object.freeze({ roundNumber: 1, roundType: "initial" as const, responses });
}

export function logRound(slog: SessionLog | null, round: DebateRound): void {
  for (const r of round.responses) {
    slog?.write("debug", `--- round ${round.roundNumber} ${r.authorName} (${r.generationTimeMs}ms) ---\n${r.responseText}`);
  }
  slog?.write("info", `round ${round.roundNumber} (${round.roundType}) complete: ${round.responses.length} responses`);
}

export class DebateOrchestrator {
  constructor(
    private readonly generator: IGenerationService,
    private readonly responder: RagResponder,
    private readonly settings: GenerationSettings,
    private readonly timeouts: Pick<TimeoutConfig, "generationMs">
  ) {}

  async run(options: DebateRunOptions): Promise<DebateSession> {
    const start = Date.now();
    const sessionId = options.sessionId ?? randomUUID();
    const { query, authors } = options;

    const slog = createSessionLog(sessionId);
    slog?.write("info", `debate ${sessionId} | query: ${query.text}`);
    slog?.write("info", `authors: ${authors.map((a) => a.id).join(", ")} | rounds: ${options.rounds}`);
    log.info("debate start:", authors.length, "authors,", options.rounds, "rounds");

    const first = await initialRound(this.responder, options);
    logRound(slog, first);
    const rounds: DebateRound[] = [first];

    for (let k = 2; k <= options.rounds; k++) {
      const previous = rounds[rounds.length - 1].responses;
      const round = await this.runRound(query, authors, previous, k, slog);
      if (round.responses.length < authors.length) {
        log.warn(`round ${k}: ${authors.length - round.responses.length}/${authors.length} authors failed,`,
          `continuing with ${round.responses.length}`);
      }
      logRound(slog, round);
      rounds.push(round);
    }

    const totalTimeMs = Date.now() - start;
    log.info("debate end:", rounds.length, "rounds,", `${totalTimeMs}ms`);
    slog?.write("info", `debate end: ${rounds.length} rounds, ${totalTimeMs}ms`);

    return Object.freeze({
      id: sessionId,
      query,
      rounds,
      totalTimeMs,
      selectionMethod: options.selectionMethod,
      mode: "debate" as const,
    });
  }

  private async runRound(
    query: Query,
    authors: readonly Author[],
    previous: readonly AuthorResponse[],
    roundNumber: number,
    slog: SessionLog | null
  ): Promise<DebateRound> {
    const roundType = roundTypeFor(roundNumber);
    log.info(`round ${roundNumber} (${roundType}) start, ${authors.length} authors`);

    const results = await settleAll(
      authors.map((author) => ({
        label: author.displayName,
        run: () => this.respondToOthers(query, author, othersFor(author.id, previous), roundType, slog),
      }))
    );

    for (const r of results) {
      if (!r.ok) {
        log.error(`round ${roundNumber}: ${r.label} failed:`, errorMessage(r.error));
        slog?.write("error", `round ${roundNumber}: ${r.label} failed: ${errorMessage(r.error)}`);
      }
    }

    return Object.freeze({ roundNumber, roundType, responses: successes(results) });
  }

  private async respondToOthers(
    query: Query,
    author: Author,
    others: readonly AuthorResponse[],
    roundType: RoundType,
    slog: SessionLog | null
  ): Promise<AuthorResponse> {
    const start = Date.now();
    const userPrompt = buildDebatePrompt(query.text, others);
    slog?.write("debug", `--- ${author.id} prompt (${roundType}) ---\n${userPrompt}`);

    const { maxTokens, temperature } = roundSettings(this.settings, roundType);
    const responseText = await withTimeout(
      (signal) => this.generator.generate({
        systemPrompt: author.systemPrompt,
        userPrompt,
        maxTokens,
        temperature,
        timeoutMs: this.timeouts.generationMs,
        signal,
      }),
      this.timeouts.generationMs,
      `generation (${author.id})`
    );

    const generationTimeMs = Date.now() - start;
    log.debug(`${author.displayName} ${roundType}: ${generationTimeMs}ms, ${responseText.length} chars`);

    // Rounds after the first are not retrieval-grounded
    return Object.freeze({
      authorId: author.id,
      authorName: author.displayName,
      responseText,
      relevanceScore: 1.0,
      retrievedChunks: [],
      generationTimeMs,
    });
  }
}
