import { describe, it, expect, beforeEach } from "vitest";
import { DebateAgent } from "../agent/debate-agent.js";
import { SharedDebateKnowledgeBase } from "../memory/knowledge-base.js";
import type { InMemoryVectorStore } from "../store/memory.js";
import { FixedEmbedder, ScriptedGenerator, makeAuthor, makeQuery, makeResponse, seededStore } from "./fakes.js";

const marx = makeAuthor("marx", "Karl Marx");
const settings = { maxResponseTokens: 400, analysisMaxTokens: 200, temperature: 0.7 };
const timeouts = { embeddingMs: 1000, searchMs: 1000, generationMs: 1000 };

const whitmanSaid = makeResponse("whitman", "Walt Whitman", "I celebrate myself and sing myself.");
const baudelaireSaid = makeResponse("baudelaire", "Charles Baudelaire", "The crowd is my domain.");
const thirdSaid = makeResponse("third", "A Third Voice", "Something else entirely.");

describe("DebateAgent", () => {
  let store: InMemoryVectorStore;
  let embedder: FixedEmbedder;
  let generator: ScriptedGenerator;
  let kb: SharedDebateKnowledgeBase;
  let agent: DebateAgent;

  beforeEach(async () => {
    store = await seededStore();
    embedder = new FixedEmbedder();
    generator = new ScriptedGenerator((o) =>
      o.userPrompt.startsWith("Analyze this argument") ? "It is vague." : "My rebuttal."
    );
    kb = new SharedDebateKnowledgeBase();
    agent = new DebateAgent({ author: marx, generator, embedder, store, knowledgeBase: kb, settings, timeouts });
  });

  it("runs the tool protocol in a rebuttal round", async () => {
    const response = await agent.takeTurn({ query: makeQuery("What is labour?"), roundNumber: 2, others: [whitmanSaid], useTools: true });

    expect(response.responseText).toBe("My rebuttal.");
    expect(response.relevanceScore).toBe(1);
    expect(response.retrievedChunks.map((c) => c.id)).toEqual(["marx-1", "marx-2"]);
    expect(agent.toolUseCount).toBe(3);
    expect(agent.reasoning).toEqual([
      "Searching my works for insights on: What is labour?",
      "Analyzing Walt Whitman's argument",
      "Analyzed Walt Whitman's argument: It is vague.",
      "Searching for additional context on their key points",
    ]);
    expect(embedder.calls).toEqual(["What is labour?", "I celebrate myself and sing myself."]);

    expect(generator.calls).toHaveLength(2);
    expect(generator.calls[0].maxTokens).toBe(200);
    expect(generator.calls[1].maxTokens).toBe(400);
    const prompt = generator.calls[1].userPrompt;
    expect(prompt).toContain("[1] (from marx book): marx passage one");
    expect(prompt).toContain("  3. Analyzed Walt Whitman's argument: It is vague.");
    expect(prompt).toContain("1. Walt Whitman said:");

    const [record] = (await kb.getRound(2)) ?? [];
    expect(record).toMatchObject({ authorId: "marx", responseText: "My rebuttal.", toolUses: 3, reasoningSteps: 4 });
    expect((await kb.getToolUses(2)).map((u) => u.tool)).toEqual([
      "search_own_works", "analyze_argument", "search_own_works",
    ]);
  });

  it("analyses at most two opposing answers", async () => {
    await agent.takeTurn({
      query: makeQuery("q"),
      roundNumber: 3,
      others: [whitmanSaid, baudelaireSaid, thirdSaid],
      useTools: true,
    });
    const analyses = generator.calls.filter((c) => c.userPrompt.startsWith("Analyze this argument"));
    expect(analyses.map((c) => c.userPrompt.split("\n")[0])).toEqual([
      "Analyze this argument from Walt Whitman:",
      "Analyze this argument from Charles Baudelaire:",
    ]);
    expect(agent.toolUseCount).toBe(4);
  });

  it("uses the first twenty words of the first answer as search terms", async () => {
    const long = makeResponse("whitman", "Walt Whitman", Array.from({ length: 30 }, (_, i) => `w${i}`).join(" "));
    await agent.takeTurn({ query: makeQuery("q"), roundNumber: 2, others: [long], useTools: true });
    expect(embedder.calls[1]).toBe(Array.from({ length: 20 }, (_, i) => `w${i}`).join(" "));
  });

  it("skips the key-term search when the first answer is empty", async () => {
    const silent = makeResponse("whitman", "Walt Whitman", "");
    const response = await agent.takeTurn({ query: makeQuery("q"), roundNumber: 2, others: [silent], useTools: true });

    expect(response.responseText).toBe("My rebuttal.");
    expect(embedder.calls).toEqual(["q"]);
    expect(agent.toolUseCount).toBe(2);
    expect(agent.reasoning).toEqual([
      "Searching my works for insights on: q",
      "Analyzing Walt Whitman's argument",
      "Analyzed Walt Whitman's argument: It is vague.",
    ]);
  });

  it("does a single search without tools", async () => {
    await agent.takeTurn({ query: makeQuery("q"), roundNumber: 2, others: [whitmanSaid], useTools: false });
    expect(agent.toolUseCount).toBe(1);
    expect(agent.reasoning).toEqual([]);
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].userPrompt).not.toContain("Your internal reasoning process:");
  });

  it("asks for an initial perspective in round 1", async () => {
    await agent.takeTurn({ query: makeQuery("q"), roundNumber: 1, others: [], useTools: true });
    expect(agent.toolUseCount).toBe(1);
    expect(generator.calls[0].userPrompt).toContain("Provide your initial perspective on this question.");
  });

  it("resets its counters each turn", async () => {
    await agent.takeTurn({ query: makeQuery("q"), roundNumber: 2, others: [whitmanSaid], useTools: true });
    await agent.takeTurn({ query: makeQuery("q"), roundNumber: 3, others: [], useTools: true });
    expect(agent.toolUseCount).toBe(1);
    expect(agent.reasoning).toEqual(["Searching my works for insights on: q"]);
  });

  it("searches another author's works", async () => {
    const results = await agent.searchOtherWorks("whitman", "q", 1);
    expect(results.map((r) => r.chunk.id)).toEqual(["whitman-1"]);
    expect((await kb.getStats()).toolStats.search_other_works).toBe(1);
  });

  it("records a recall only when the round exists", async () => {
    await kb.recordResponse(1, "whitman", "Walt Whitman", "earlier", 0, 0);
    await expect(agent.recallPreviousRound(5)).resolves.toBeUndefined();
    const records = await agent.recallPreviousRound(1);
    expect(records?.map((r) => r.responseText)).toEqual(["earlier"]);
    expect(agent.toolUseCount).toBe(1);
    expect((await kb.getStats()).toolStats.recall_previous_round).toBe(1);
  });

  it("fails the turn when a tool fails", async () => {
    embedder.failWith = new Error("embedding backend down");
    await expect(agent.takeTurn({ query: makeQuery("q"), roundNumber: 2, others: [whitmanSaid], useTools: true }))
      .rejects.toThrow("embedding backend down");
    await expect(kb.getRound(2)).resolves.toBeUndefined();
  });
});
