import { describe, it, expect } from "vitest";
import { createQuery } from "../query.js";
import { ValidationError } from "../errors.js";

const defaults = { minAuthors: 2, maxAuthors: 5, relevanceThreshold: 0.7 };

describe("createQuery", () => {
  it("fills router defaults and trims the text", () => {
    const query = createQuery({ text: "  What is freedom?  " }, defaults);
    expect(query).toEqual({
      text: "What is freedom?",
      explicitAuthors: undefined,
      minAuthors: 2,
      maxAuthors: 5,
      relevanceThreshold: 0.7,
    });
  });

  it("keeps caller overrides", () => {
    const query = createQuery({ text: "q", minAuthors: 1, maxAuthors: 3, relevanceThreshold: 0.4 }, defaults);
    expect(query.minAuthors).toBe(1);
    expect(query.maxAuthors).toBe(3);
    expect(query.relevanceThreshold).toBe(0.4);
  });

  it("rejects empty or whitespace text", () => {
    expect(() => createQuery({ text: "" }, defaults)).toThrow("Query text cannot be empty");
    expect(() => createQuery({ text: "   \n" }, defaults)).toThrow(ValidationError);
  });

  it("rejects minAuthors greater than maxAuthors", () => {
    expect(() => createQuery({ text: "q", minAuthors: 4, maxAuthors: 3 }, defaults))
      .toThrow("minAuthors (4) must be <= maxAuthors (3)");
  });

  it("rejects thresholds outside [0, 1]", () => {
    expect(() => createQuery({ text: "q", relevanceThreshold: 1.2 }, defaults)).toThrow(ValidationError);
  });

  it("de-duplicates explicit authors and caps them at maxAuthors", () => {
    const query = createQuery({ text: "q", explicitAuthors: ["marx", "whitman", "marx"] }, defaults);
    expect(query.explicitAuthors).toEqual(["marx", "whitman"]);
    expect(() => createQuery({ text: "q", explicitAuthors: ["a", "b", "c"], maxAuthors: 2, minAuthors: 1 }, defaults))
      .toThrow("3 authors requested but maxAuthors is 2");
  });

  it("treats an empty explicit list as no list", () => {
    expect(createQuery({ text: "q", explicitAuthors: [] }, defaults).explicitAuthors).toBeUndefined();
  });

  it("returns a frozen query", () => {
    expect(Object.isFrozen(createQuery({ text: "q" }, defaults))).toBe(true);
  });
});
