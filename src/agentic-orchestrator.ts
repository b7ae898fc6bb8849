/**
 * AgenticDebateOrchestrator: multi-round debate where each author is a
 * tool-using DebateAgent sharing one knowledge base.
 *
 * Round 1 is the plain RAG answer (nothing to react to yet), recorded with
 * zero tool uses. Rounds 2..N run every agent concurrently behind the same
 * round barrier as the basic orchestrator.
 */

import { randomUUID } from "node:crypto";
import type { IEmbeddingService, IGenerationService } from "./adapters/base.js";
import type { IVectorStore } from "./store/interfaces.js";
import type { RagResponder } from "./rag/responder.js";
import type { DebateRound, DebateSession } from "./types.js";
import { roundTypeFor } from "./types.js";
import type { TimeoutConfig } from "./config.js";
import type { DebateRunOptions } from "./orchestrator.js";
import { initialRound, logRound, othersFor } from "./orchestrator.js";
import { DebateAgent } from "./agent/debate-agent.js";
import type { AgentSettings } from "./agent/debate-agent.js";
import { SharedDebateKnowledgeBase } from "./memory/knowledge-base.js";
import { settleAll, successes } from "./concurrency.js";
import { errorMessage } from "./errors.js";
import { createLogger, createSessionLog } from "./logger.js";

const log = createLogger("agentic");

export interface AgenticRunOptions extends DebateRunOptions {
  /** Run the tool protocol in rounds >= 2. Off: one own-works search, then generate. */
  useTools: boolean;
}

export interface AgenticOrchestratorDeps {
  generator: IGenerationService;
  embedder: IEmbeddingService;
  store: IVectorStore;
  responder: RagResponder;
  settings: AgentSettings;
  timeouts: TimeoutConfig;
}

export class AgenticDebateOrchestrator {
  constructor(private readonly deps: AgenticOrchestratorDeps) {}

  async run(options: AgenticRunOptions): Promise<DebateSession> {
    const start = Date.now();
    const sessionId = options.sessionId ?? randomUUID();
    const { query, authors, useTools } = options;

    const slog = createSessionLog(sessionId);
    slog?.write("info", `agentic debate ${sessionId} | query: ${query.text}`);
    slog?.write("info", `authors: ${authors.map((a) => a.id).join(", ")} | rounds: ${options.rounds} | tools: ${useTools}`);
    log.info(`agentic debate start: ${authors.length} authors, ${options.rounds} rounds,`,
      `tools=${useTools ? "enabled" : "disabled"}`);

    const knowledgeBase = new SharedDebateKnowledgeBase();
    const agents = authors.map((author) => new DebateAgent({
      author,
      generator: this.deps.generator,
      embedder: this.deps.embedder,
      store: this.deps.store,
      knowledgeBase,
      settings: this.deps.settings,
      timeouts: this.deps.timeouts,
      sessionLog: slog,
    }));

    const first = await initialRound(this.deps.responder, options);
    for (const r of first.responses) {
      await knowledgeBase.recordResponse(1, r.authorId, r.authorName, r.responseText, 0, 0);
    }
    logRound(slog, first);
    const rounds: DebateRound[] = [first];

    for (let k = 2; k <= options.rounds; k++) {
      const previous = rounds[rounds.length - 1].responses;
      log.info(`agentic round ${k} start`);

      const results = await settleAll(
        agents.map((agent) => ({
          label: agent.author.displayName,
          run: () => agent.takeTurn({
            query,
            roundNumber: k,
            others: othersFor(agent.author.id, previous),
            useTools,
          }),
        }))
      );
      for (const r of results) {
        if (!r.ok) {
          log.error(`round ${k}: agentic response for ${r.label} failed:`, errorMessage(r.error));
          slog?.write("error", `round ${k}: ${r.label} failed: ${errorMessage(r.error)}`);
        }
      }

      const round: DebateRound = Object.freeze({ roundNumber: k, roundType: roundTypeFor(k), responses: successes(results) });
      logRound(slog, round);
      rounds.push(round);
    }

    const knowledge = await knowledgeBase.getStats();
    const totalTimeMs = Date.now() - start;
    log.info(`agentic debate end: ${rounds.length} rounds, ${authors.length} authors,`,
      `${knowledge.totalToolUses} tool uses, ${totalTimeMs}ms`);
    slog?.write("info", `agentic debate end: ${rounds.length} rounds, ${knowledge.totalToolUses} tool uses, ${totalTimeMs}ms`);

    return Object.freeze({
      id: sessionId,
      query,
      rounds,
      totalTimeMs,
      selectionMethod: options.selectionMethod,
      mode: "agentic" as const,
      knowledge,
    });
  }
}
