import { describe, it, expect } from "vitest";
import { AgenticDebateOrchestrator } from "../agentic-orchestrator.js";
import { RagResponder } from "../rag/responder.js";
import type { GenerateOptions } from "../adapters/base.js";
import { FixedEmbedder, ScriptedGenerator, makeAuthor, makeQuery, seededStore } from "./fakes.js";

const marx = makeAuthor("marx", "Karl Marx");
const whitman = makeAuthor("whitman", "Walt Whitman");

const timeouts = { embeddingMs: 1000, searchMs: 1000, generationMs: 1000 };
const settings = { maxResponseTokens: 400, analysisMaxTokens: 200, temperature: 0.7 };

async function setup(reply: (options: GenerateOptions) => string | Promise<string>) {
  const generator = new ScriptedGenerator(reply);
  const embedder = new FixedEmbedder();
  const store = await seededStore();
  const responder = new RagResponder(generator, store, { topKChunks: 2, maxResponseTokens: 300, temperature: 0.7 }, timeouts);
  const orchestrator = new AgenticDebateOrchestrator({ generator, embedder, store, responder, settings, timeouts });
  return { generator, orchestrator };
}

function reply(options: GenerateOptions): string {
  if (options.userPrompt.startsWith("Analyze this argument")) return "Weak on history.";
  return `${options.systemPrompt} speaks`;
}

describe("AgenticDebateOrchestrator.run", () => {
  it("runs tool-using agents after a plain first round", async () => {
    const { generator, orchestrator } = await setup(reply);
    const session = await orchestrator.run({
      query: makeQuery("What is freedom?"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "fallback_top_k",
      rounds: 2,
      useTools: true,
    });

    expect(session.mode).toBe("agentic");
    expect(session.selectionMethod).toBe("fallback_top_k");
    expect(session.rounds.map((r) => r.roundType)).toEqual(["initial", "rebuttal"]);
    expect(session.rounds[1].responses.map((r) => r.responseText)).toEqual([
      "You are Karl Marx. speaks",
      "You are Walt Whitman. speaks",
    ]);
    expect(session.knowledge).toEqual({
      totalRounds: 2,
      totalResponses: 4,
      totalToolUses: 6,
      toolStats: {
        search_own_works: 4,
        search_other_works: 0,
        recall_previous_round: 0,
        analyze_argument: 2,
      },
    });
    // 2 round-1 answers, then per agent one analysis and one final answer
    expect(generator.calls).toHaveLength(6);
  });

  it("skips the tool protocol when tools are off", async () => {
    const { generator, orchestrator } = await setup(reply);
    const session = await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 3,
      useTools: false,
    });

    expect(session.rounds).toHaveLength(3);
    expect(session.knowledge?.totalToolUses).toBe(4);
    expect(session.knowledge?.toolStats.analyze_argument).toBe(0);
    expect(generator.calls).toHaveLength(6);
  });

  it("drops an agent whose turn fails and keeps the debate going", async () => {
    const { orchestrator } = await setup((o) => {
      if (o.systemPrompt.includes("Whitman") && o.userPrompt.includes("Passages from your works:")) {
        throw new Error("model crashed");
      }
      return reply(o);
    });
    const session = await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 2,
      useTools: true,
    });

    expect(session.rounds[0].responses).toHaveLength(2);
    expect(session.rounds[1].responses.map((r) => r.authorId)).toEqual(["marx"]);
    expect(session.knowledge?.totalResponses).toBe(3);
  });
});
