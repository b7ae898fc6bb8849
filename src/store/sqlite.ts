/**
 * SQLite vector store using better-sqlite3.
 *
 * Vectors are stored as JSON text and compared by brute-force cosine
 * similarity in process. Fine for corpora of a few tens of thousands of
 * chunks; a real ANN index is out of scope.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { IVectorStore } from "./interfaces.js";
import { requireEmbedding } from "./interfaces.js";
import type { ChunkMetadata, ScoredChunk, TextChunk, Vector } from "../types.js";
import { cosineSimilarity, rankByScore } from "../routing/similarity.js";
import { RetrievalError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("vector-store");

const VectorSchema = z.array(z.number());
const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const ChunkRowSchema = z.object({
  id: z.string(),
  author_id: z.string(),
  text: z.string(),
  embedding: z.string(),
  metadata: z.string(),
});

const ProfileRowSchema = z.object({
  author_id: z.string(),
  vector: z.string(),
});

type ChunkRow = z.infer<typeof ChunkRowSchema>;

function parseJsonColumn<T>(schema: z.ZodType<T>, raw: string, what: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new RetrievalError(`corrupt ${what} column`, err);
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RetrievalError(`corrupt ${what} column: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function rowToChunk(row: ChunkRow): TextChunk & { embedding: Vector } {
  const metadata: ChunkMetadata = parseJsonColumn(MetadataSchema, row.metadata, "metadata");
  return {
    id: row.id,
    authorId: row.author_id,
    text: row.text,
    embedding: parseJsonColumn(VectorSchema, row.embedding, "embedding"),
    metadata,
  };
}

export class SqliteVectorStore implements IVectorStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
  }

  async initialize(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        author_id TEXT NOT NULL,
        text TEXT NOT NULL,
        embedding TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}'
      );
      CREATE INDEX IF NOT EXISTS idx_chunks_author ON chunks(author_id);

      CREATE TABLE IF NOT EXISTS author_profiles (
        author_id TEXT PRIMARY KEY,
        vector TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
    log.debug("schema ready");
  }

  async close(): Promise<void> {
    this.db.close();
  }

  async search(vector: Vector, authorFilter: string | null, k: number): Promise<ScoredChunk[]> {
    const rows: unknown[] = authorFilter === null
      ? this.db.prepare("SELECT id, author_id, text, embedding, metadata FROM chunks ORDER BY rowid").all()
      : this.db
          .prepare("SELECT id, author_id, text, embedding, metadata FROM chunks WHERE author_id = ? ORDER BY rowid")
          .all(authorFilter);

    const scored = rows.map((raw): ScoredChunk => {
      const chunk = rowToChunk(ChunkRowSchema.parse(raw));
      return { chunk, score: cosineSimilarity(vector, chunk.embedding) };
    });
    const top = rankByScore(scored, (s) => s.score).slice(0, Math.max(0, k));
    log.debug("search:", rows.length, "candidates,", top.length, "returned",
      authorFilter ? `(author=${authorFilter})` : "");
    return top;
  }

  async getAllProfiles(): Promise<Map<string, Vector>> {
    const rows: unknown[] = this.db.prepare("SELECT author_id, vector FROM author_profiles ORDER BY author_id").all();
    const profiles = new Map<string, Vector>();
    for (const raw of rows) {
      const row = ProfileRowSchema.parse(raw);
      profiles.set(row.author_id, parseJsonColumn(VectorSchema, row.vector, "profile vector"));
    }
    return profiles;
  }

  async upsertChunks(chunks: readonly TextChunk[]): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (id, author_id, text, embedding, metadata) VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        author_id = excluded.author_id,
        text = excluded.text,
        embedding = excluded.embedding,
        metadata = excluded.metadata
    `);
    const insertAll = this.db.transaction((batch: readonly TextChunk[]) => {
      for (const chunk of batch) {
        stmt.run(
          chunk.id,
          chunk.authorId,
          chunk.text,
          JSON.stringify(requireEmbedding(chunk)),
          JSON.stringify(chunk.metadata),
        );
      }
    });
    insertAll(chunks);
    log.info("upserted", chunks.length, "chunks");
  }

  async upsertProfile(authorId: string, vector: Vector): Promise<void> {
    this.db.prepare(`
      INSERT INTO author_profiles (author_id, vector, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(author_id) DO UPDATE SET vector = excluded.vector, updated_at = excluded.updated_at
    `).run(authorId, JSON.stringify(vector), new Date().toISOString());
  }
}
