/**
 * Core data model shared by routing, retrieval and the debate orchestrators.
 *
 * Everything here is a plain readonly value: authors are frozen at load time,
 * responses and rounds are created once and never touched again.
 */

export type Vector = readonly number[];

export interface Author {
  readonly id: string;
  readonly displayName: string;
  readonly expertiseDomains: ReadonlySet<string>;
  /** One-line description of tone / vocabulary / perspective. */
  readonly voiceDescriptor: string;
  readonly systemPrompt: string;
  readonly expertiseVector?: Vector;
}

export interface Query {
  readonly text: string;
  readonly explicitAuthors?: readonly string[];
  readonly minAuthors: number;
  readonly maxAuthors: number;
  readonly relevanceThreshold: number;
}

export type SelectionMethod = "specified" | "threshold" | "fallback_top_k" | "threshold_partial";

export interface AuthorSelectionResult {
  /** Selected author ids, highest score first (request order for "specified"). */
  readonly selectedAuthors: readonly string[];
  /** Score in [0,1] for every author that was scored. */
  readonly similarityScores: Readonly<Record<string, number>>;
  readonly method: SelectionMethod;
  readonly queryVector: Vector;
  readonly thresholdUsed: number;
}

export type ChunkMetadata = Readonly<Record<string, string | number | boolean>>;

export interface TextChunk {
  readonly id: string;
  readonly authorId: string;
  readonly text: string;
  readonly embedding?: Vector;
  readonly metadata: ChunkMetadata;
}

export interface ScoredChunk {
  readonly chunk: TextChunk;
  /** Similarity in [0,1], higher is closer. */
  readonly score: number;
}

export interface ChunkRef {
  readonly id: string;
  readonly metadata: ChunkMetadata;
}

export interface AuthorResponse {
  readonly authorId: string;
  readonly authorName: string;
  readonly responseText: string;
  readonly relevanceScore: number;
  readonly retrievedChunks: readonly ChunkRef[];
  readonly generationTimeMs: number;
}

export type RoundType = "initial" | "rebuttal" | "response";

export interface DebateRound {
  readonly roundNumber: number;
  readonly roundType: RoundType;
  readonly responses: readonly AuthorResponse[];
}

export type DebateMode = "single" | "debate" | "agentic";

export type ToolName =
  | "search_own_works"
  | "search_other_works"
  | "recall_previous_round"
  | "analyze_argument";

export interface KnowledgeBaseStats {
  readonly totalRounds: number;
  readonly totalResponses: number;
  readonly totalToolUses: number;
  readonly toolStats: Readonly<Record<ToolName, number>>;
}

export interface DebateSession {
  readonly id: string;
  readonly query: Query;
  readonly rounds: readonly DebateRound[];
  readonly totalTimeMs: number;
  readonly selectionMethod: SelectionMethod;
  readonly mode: DebateMode;
  /** Shared knowledge-base counters (agentic sessions only). */
  readonly knowledge?: KnowledgeBaseStats;
}

/** Round type for a 1-based round number. */
export function roundTypeFor(roundNumber: number): RoundType {
  if (roundNumber <= 1) return "initial";
  if (roundNumber === 2) return "rebuttal";
  return "response";
}

export function toChunkRef(chunk: TextChunk): ChunkRef {
  return { id: chunk.id, metadata: chunk.metadata };
}
