import { describe, it, expect } from "vitest";
import { DebateOrchestrator, othersFor, roundSettings } from "../orchestrator.js";
import { RagResponder } from "../rag/responder.js";
import { roundTypeFor } from "../types.js";
import { GenerationFailedError } from "../errors.js";
import type { GenerateOptions } from "../adapters/base.js";
import { ScriptedGenerator, makeAuthor, makeQuery, makeResponse, seededStore } from "./fakes.js";

const marx = makeAuthor("marx", "Karl Marx");
const whitman = makeAuthor("whitman", "Walt Whitman");
const baudelaire = makeAuthor("baudelaire", "Charles Baudelaire");

const rag = { topKChunks: 2, maxResponseTokens: 300, temperature: 0.7 };
const settings = {
  maxResponseTokens: 300,
  temperature: 0.7,
  roundOverrides: { rebuttal: { temperature: 0.9 }, response: { maxTokens: 150 } },
};

function isRebuttal(options: GenerateOptions): boolean {
  return options.userPrompt.startsWith("The original question was:");
}

function roundOf(options: GenerateOptions, calls: GenerateOptions[]): number {
  // Round-1 prompts come from the RAG template; count the debate prompts seen so far for this author.
  if (!isRebuttal(options)) return 1;
  return 1 + calls.filter((c) => c.systemPrompt === options.systemPrompt && isRebuttal(c)).length;
}

async function setup(reply: (options: GenerateOptions, round: number) => string | Promise<string>, generationMs = 1000) {
  const calls: GenerateOptions[] = [];
  const generator = new ScriptedGenerator((o) => {
    calls.push(o);
    return reply(o, roundOf(o, calls));
  });
  const store = await seededStore();
  const responder = new RagResponder(generator, store, rag, { searchMs: 1000, generationMs });
  const orchestrator = new DebateOrchestrator(generator, responder, settings, { generationMs });
  return { generator, orchestrator };
}

function speaker(options: GenerateOptions): string {
  return options.systemPrompt.replace("You are ", "").replace(".", "");
}

describe("roundTypeFor", () => {
  it("names rounds 1, 2 and later", () => {
    expect([1, 2, 3, 5].map(roundTypeFor)).toEqual(["initial", "rebuttal", "response", "response"]);
  });
});

describe("roundSettings", () => {
  it("applies per-round-type overrides", () => {
    expect(roundSettings(settings, "initial")).toEqual({ maxTokens: 300, temperature: 0.7 });
    expect(roundSettings(settings, "rebuttal")).toEqual({ maxTokens: 300, temperature: 0.9 });
    expect(roundSettings(settings, "response")).toEqual({ maxTokens: 150, temperature: 0.7 });
  });
});

describe("othersFor", () => {
  it("excludes the author's own response", () => {
    const previous = [makeResponse("marx", "Karl Marx", "a"), makeResponse("whitman", "Walt Whitman", "b")];
    expect(othersFor("marx", previous).map((r) => r.authorId)).toEqual(["whitman"]);
  });
});

describe("DebateOrchestrator.run", () => {
  it("runs every round with typed rounds and non-grounded rebuttals", async () => {
    const { orchestrator } = await setup((o, round) => `${speaker(o)} round ${round}`);
    const session = await orchestrator.run({
      query: makeQuery("What is freedom?"),
      authors: [marx, whitman, baudelaire],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 3,
      sessionId: "debate-1",
    });

    expect(session.id).toBe("debate-1");
    expect(session.mode).toBe("debate");
    expect(session.rounds.map((r) => [r.roundNumber, r.roundType])).toEqual([
      [1, "initial"], [2, "rebuttal"], [3, "response"],
    ]);
    for (const round of session.rounds) {
      expect(round.responses).toHaveLength(3);
    }
    const rebuttal = session.rounds[1].responses[0];
    expect(rebuttal.responseText).toBe("Karl Marx round 2");
    expect(rebuttal.relevanceScore).toBe(1);
    expect(rebuttal.retrievedChunks).toEqual([]);
    expect(session.rounds[0].responses[0].retrievedChunks).toHaveLength(2);
  });

  it("never shows an author their own previous answer", async () => {
    const { generator, orchestrator } = await setup((o, round) => `${speaker(o)} said this in round ${round}`);
    await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman, baudelaire],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 3,
    });

    const debateCalls = generator.calls.filter(isRebuttal);
    expect(debateCalls).toHaveLength(6);
    for (const call of debateCalls) {
      const self = speaker(call);
      expect(call.userPrompt).not.toContain(`${self} said this`);
      const others = ["Karl Marx", "Walt Whitman", "Charles Baudelaire"].filter((n) => n !== self);
      for (const name of others) {
        expect(call.userPrompt).toContain(`${name} said:`);
      }
    }
  });

  it("applies round overrides to the generation request", async () => {
    const { generator, orchestrator } = await setup(() => "text");
    await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 3,
    });
    const requests = generator.calls.map((c) => [c.maxTokens, c.temperature]);
    expect(requests).toEqual([
      [300, 0.7], [300, 0.7],
      [300, 0.9], [300, 0.9],
      [150, 0.7], [150, 0.7],
    ]);
  });

  it("carries on without an author who times out", async () => {
    const { generator, orchestrator } = await setup(
      (o, round) => (speaker(o) === "Walt Whitman" && round === 2 ? new Promise<string>(() => {}) : `${speaker(o)} r${round}`),
      50
    );
    const session = await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 3,
    });

    expect(session.rounds[1].responses.map((r) => r.authorId)).toEqual(["marx"]);
    expect(session.rounds[2].responses.map((r) => r.authorId)).toEqual(["marx", "whitman"]);

    const whitmanRound3 = generator.calls.filter((c) => speaker(c) === "Walt Whitman" && isRebuttal(c))[1];
    expect(whitmanRound3.userPrompt).toContain('"Karl Marx r2"');

    const marxRound3 = generator.calls.filter((c) => speaker(c) === "Karl Marx" && isRebuttal(c))[1];
    expect(marxRound3.userPrompt).toContain("No other thinker responded in the previous round.");
  });

  it("uses caller-supplied round-1 answers", async () => {
    const { generator, orchestrator } = await setup(() => "rebuttal");
    const session = await orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "specified",
      rounds: 2,
      initialResponses: [makeResponse("marx", "Karl Marx", "given"), makeResponse("whitman", "Walt Whitman", "given too")],
    });
    expect(session.rounds[0].responses.map((r) => r.responseText)).toEqual(["given", "given too"]);
    expect(generator.calls).toHaveLength(2);
  });

  it("fails when round 1 produces nothing", async () => {
    const { orchestrator } = await setup(() => {
      throw new Error("backend down");
    });
    await expect(orchestrator.run({
      query: makeQuery("q"),
      authors: [marx, whitman],
      queryVector: [1, 0, 0],
      selectionMethod: "threshold",
      rounds: 2,
    })).rejects.toBeInstanceOf(GenerationFailedError);
  });
});
