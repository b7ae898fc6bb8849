/**
 * Vector store tests: the SQLite store and the in-memory store share one suite.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import type { IVectorStore } from "../store/interfaces.js";
import { SqliteVectorStore } from "../store/sqlite.js";
import { InMemoryVectorStore } from "../store/memory.js";
import { RetrievalError, ValidationError } from "../errors.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "colloquy-test-"));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

const factories: Array<[string, () => IVectorStore]> = [
  ["SqliteVectorStore", () => new SqliteVectorStore(join(tmpDir, "nested", "vectors.db"))],
  ["InMemoryVectorStore", () => new InMemoryVectorStore()],
];

describe.each(factories)("%s", (_name, factory) => {
  let store: IVectorStore;

  beforeEach(async () => {
    store = factory();
    await store.initialize();
    await store.upsertChunks([
      { id: "m1", authorId: "marx", text: "On the working day", embedding: [1, 0, 0], metadata: { book: "Capital" } },
      { id: "m2", authorId: "marx", text: "On rent", embedding: [0.6, 0.8, 0], metadata: { book: "Capital", page: 12 } },
      { id: "w1", authorId: "whitman", text: "Song of Myself", embedding: [0, 1, 0], metadata: {} },
    ]);
  });

  afterEach(async () => {
    await store.close();
  });

  it("returns the nearest chunks first", async () => {
    const results = await store.search([1, 0, 0], null, 2);
    expect(results.map((r) => r.chunk.id)).toEqual(["m1", "m2"]);
    expect(results[0].score).toBeCloseTo(1);
    expect(results[1].score).toBeCloseTo(0.6);
  });

  it("raises RetrievalError for a query vector of another dimension", async () => {
    await expect(store.search([1, 0], "marx", 2)).rejects.toBeInstanceOf(RetrievalError);
    await expect(store.search([1, 0, 0, 0], null, 2)).rejects.toThrow("Vector dimension mismatch: 4 vs 3");
  });

  it("filters by author", async () => {
    const results = await store.search([1, 0, 0], "whitman", 5);
    expect(results.map((r) => r.chunk.id)).toEqual(["w1"]);
    expect(results[0].score).toBe(0);
  });

  it("returns nothing for an unknown author or k = 0", async () => {
    await expect(store.search([1, 0, 0], "plato", 5)).resolves.toEqual([]);
    await expect(store.search([1, 0, 0], null, 0)).resolves.toEqual([]);
  });

  it("round-trips chunk text and metadata", async () => {
    const [top] = await store.search([0.6, 0.8, 0], "marx", 1);
    expect(top.chunk).toMatchObject({ id: "m2", authorId: "marx", text: "On rent", metadata: { book: "Capital", page: 12 } });
  });

  it("replaces a chunk with the same id", async () => {
    await store.upsertChunks([
      { id: "m1", authorId: "marx", text: "Revised", embedding: [0, 0, 1], metadata: {} },
    ]);
    const [top] = await store.search([0, 0, 1], "marx", 1);
    expect(top.chunk.text).toBe("Revised");
    expect(top.score).toBeCloseTo(1);
  });

  it("rejects chunks without an embedding", async () => {
    await expect(store.upsertChunks([{ id: "x", authorId: "marx", text: "t", metadata: {} }]))
      .rejects.toThrow(ValidationError);
  });

  it("stores and replaces author profiles", async () => {
    await store.upsertProfile("whitman", [0, 1, 0]);
    await store.upsertProfile("marx", [1, 0, 0]);
    await store.upsertProfile("marx", [0.5, 0.5, 0]);
    const profiles = await store.getAllProfiles();
    expect(profiles.size).toBe(2);
    expect(profiles.get("marx")).toEqual([0.5, 0.5, 0]);
    expect(profiles.get("whitman")).toEqual([0, 1, 0]);
  });
});

describe("SqliteVectorStore persistence", () => {
  it("keeps data across reopen", async () => {
    const path = join(tmpDir, "vectors.db");
    const first = new SqliteVectorStore(path);
    await first.initialize();
    await first.upsertProfile("baudelaire", [0, 0, 1]);
    await first.close();

    const second = new SqliteVectorStore(path);
    await second.initialize();
    expect((await second.getAllProfiles()).get("baudelaire")).toEqual([0, 0, 1]);
    await second.close();
  });

  it("raises RetrievalError on a corrupt vector column", async () => {
    const path = join(tmpDir, "vectors.db");
    const store = new SqliteVectorStore(path);
    await store.initialize();
    await store.upsertProfile("marx", [1, 0, 0]);

    const raw = new Database(path);
    raw.prepare("UPDATE author_profiles SET vector = ? WHERE author_id = ?").run("{not json", "marx");
    raw.close();

    await expect(store.getAllProfiles()).rejects.toBeInstanceOf(RetrievalError);
    await store.close();
  });
});
